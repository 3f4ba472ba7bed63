import { describe, test, expect } from 'vitest';
import { wrapAround, clampToBounds, isOutOfBounds, isOlderThan, composeRules } from './rules';
import { createBody2D, integrateBody2D, setBody2DVelocity, addBody2DVelocity, getBody2DVelocity } from './rigid-body';
import { createCircle } from './shapes';
import { vec2 } from '../../math/vec';

const BOUNDS = { width: 100, height: 50 };

function ball(x: number, y: number) {
    return createBody2D(createCircle(1), vec2(x, y));
}

describe('wrapAround', () => {
    test('re-enters from the opposite edge keeping velocity', () => {
        const body = setBody2DVelocity(ball(105, -5), vec2(60, 0));
        wrapAround(BOUNDS)(body);
        expect(body.position).toEqual({ x: 5, y: 45 });
        const v = getBody2DVelocity(body);
        expect(v.x).toBeCloseTo(60, 8);
        expect(v.y).toBeCloseTo(0, 8);
    });

    test('leaves bodies inside the bounds untouched', () => {
        const body = ball(20, 20);
        const before = body.position;
        expect(wrapAround(BOUNDS)(body)).toBe(body);
        expect(body.position).toBe(before);
    });
});

describe('clampToBounds', () => {
    test('stops at the edge and drops the outward velocity', () => {
        const body = setBody2DVelocity(ball(120, 10), vec2(30, 6));
        clampToBounds(BOUNDS)(body);
        expect(body.position).toEqual({ x: 100, y: 10 });
        const v = getBody2DVelocity(body);
        expect(v.x).toBe(0);
        expect(v.y).toBeCloseTo(6, 8);
    });

    test('keeps inward velocity', () => {
        const body = setBody2DVelocity(ball(-3, 10), vec2(12, 0));
        clampToBounds(BOUNDS)(body);
        expect(body.position).toEqual({ x: 0, y: 10 });
        expect(getBody2DVelocity(body).x).toBeCloseTo(12, 8);
    });
});

describe('predicates', () => {
    test('isOutOfBounds honours the margin', () => {
        const body = ball(-5, 10);
        expect(isOutOfBounds(BOUNDS)(body)).toBe(true);
        expect(isOutOfBounds(BOUNDS, 10)(body)).toBe(false);
        expect(isOutOfBounds(BOUNDS)(ball(100, 50))).toBe(false);
    });

    test('isOlderThan compares simulated age', () => {
        const body = ball(0, 0);
        const old = isOlderThan(0.05);
        integrateBody2D(body);
        integrateBody2D(body);
        expect(old(body)).toBe(false);
        integrateBody2D(body);
        integrateBody2D(body);
        expect(old(body)).toBe(true);
    });
});

describe('composeRules', () => {
    test('applies rules left to right', () => {
        const rule = composeRules(
            body => setBody2DVelocity(body, vec2(60, 0)),
            body => addBody2DVelocity(body, vec2(0, 60))
        );
        const v = getBody2DVelocity(rule(ball(0, 0)));
        expect(v.x).toBeCloseTo(60, 8);
        expect(v.y).toBeCloseTo(60, 8);
    });
});
