/**
 * Math Module
 *
 * Float vector and angle helpers used by the physics core.
 */

// 2D Vectors
export {
    vec2,
    vec2Zero,
    vec2Clone,
    vec2Add,
    vec2Sub,
    vec2Scale,
    vec2Neg,
    vec2Dot,
    vec2Cross,
    vec2LengthSq,
    vec2Length,
    vec2Normalize,
    vec2Perp,
    vec2Rotate,
    vec2Distance,
    vec2DistanceSq,
    vec2Equals
} from './vec';
export type { Vec2 } from './vec';

// Angles
export {
    PI,
    TWO_PI,
    degToRad,
    radToDeg,
    normalizeAngle,
    angleToDirection,
    directionToAngle
} from './angle';
export type { Angle } from './angle';
