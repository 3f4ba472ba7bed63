/**
 * Bounds Rules
 *
 * Ready-made update rules and removal predicates for World2D.updateGroups
 * and World2D.removeObjectIf. The world itself never enforces its bounds.
 */

import { vec2 } from '../../math/vec';
import { BodyUpdate2D, BodyPredicate2D, getBody2DVelocity, setBody2DPosition, setBody2DVelocity } from './rigid-body';
import type { Dimensions2D } from './world';

function wrap(value: number, size: number): number {
    if (size <= 0) return value;
    return ((value % size) + size) % size;
}

function clamp(value: number, min: number, max: number): number {
    return value < min ? min : value > max ? max : value;
}

/**
 * Toroidal wrap: leaving one edge re-enters from the opposite one.
 * Velocity is unchanged.
 */
export function wrapAround(dimensions: Dimensions2D): BodyUpdate2D {
    return body => {
        const { x, y } = body.position;
        const wx = wrap(x, dimensions.width);
        const wy = wrap(y, dimensions.height);
        if (wx === x && wy === y) return body;
        return setBody2DPosition(body, vec2(wx, wy));
    };
}

/**
 * Keep the body inside [0, width] x [0, height]. The velocity component
 * pushing outward is zeroed.
 */
export function clampToBounds(dimensions: Dimensions2D): BodyUpdate2D {
    return body => {
        const { x, y } = body.position;
        const cx = clamp(x, 0, dimensions.width);
        const cy = clamp(y, 0, dimensions.height);
        if (cx === x && cy === y) return body;

        const velocity = getBody2DVelocity(body);
        const vx = (cx > x && velocity.x < 0) || (cx < x && velocity.x > 0) ? 0 : velocity.x;
        const vy = (cy > y && velocity.y < 0) || (cy < y && velocity.y > 0) ? 0 : velocity.y;

        setBody2DPosition(body, vec2(cx, cy));
        return setBody2DVelocity(body, vec2(vx, vy));
    };
}

export function isOutOfBounds(dimensions: Dimensions2D, margin: number = 0): BodyPredicate2D {
    return body => {
        const { x, y } = body.position;
        return x < -margin || y < -margin ||
               x > dimensions.width + margin || y > dimensions.height + margin;
    };
}

export function isOlderThan(seconds: number): BodyPredicate2D {
    return body => body.age > seconds;
}

/** Apply rules left to right. */
export function composeRules(...rules: BodyUpdate2D[]): BodyUpdate2D {
    return body => rules.reduce((current, rule) => rule(current), body);
}
