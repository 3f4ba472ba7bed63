/**
 * Angles
 *
 * Angles are plain radians, counter-clockwise from the +X axis.
 */

import type { Vec2 } from './vec';

export type Angle = number;

export const PI = Math.PI;
export const TWO_PI = Math.PI * 2;

export function degToRad(degrees: number): Angle {
    return (degrees * PI) / 180;
}

export function radToDeg(radians: Angle): number {
    return (radians * 180) / PI;
}

/**
 * Wrap an angle into (-PI, PI].
 */
export function normalizeAngle(angle: Angle): Angle {
    let a = angle % TWO_PI;
    if (a <= -PI) a += TWO_PI;
    else if (a > PI) a -= TWO_PI;
    return a;
}

/** Unit vector pointing along `angle`. */
export function angleToDirection(angle: Angle): Vec2 {
    return { x: Math.cos(angle), y: Math.sin(angle) };
}

export function directionToAngle(direction: Vec2): Angle {
    return Math.atan2(direction.y, direction.x);
}
