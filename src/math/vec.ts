/**
 * 2D Vector Math
 *
 * Plain-object vectors with free functions. Every function returns a new
 * vector; inputs are never mutated, so a Vec2 can be shared between a body
 * and the snapshots taken of it.
 */

import type { Angle } from './angle';

// ============================================
// 2D Vector
// ============================================

export interface Vec2 {
    readonly x: number;
    readonly y: number;
}

export function vec2(x: number, y: number): Vec2 {
    return { x, y };
}

export function vec2Zero(): Vec2 {
    return { x: 0, y: 0 };
}

export function vec2Clone(v: Vec2): Vec2 {
    return { x: v.x, y: v.y };
}

export function vec2Add(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function vec2Sub(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2Scale(v: Vec2, s: number): Vec2 {
    return { x: v.x * s, y: v.y * s };
}

export function vec2Neg(v: Vec2): Vec2 {
    return { x: -v.x, y: -v.y };
}

export function vec2Dot(a: Vec2, b: Vec2): number {
    return a.x * b.x + a.y * b.y;
}

/** 2D cross product (returns z component of 3D cross) */
export function vec2Cross(a: Vec2, b: Vec2): number {
    return a.x * b.y - a.y * b.x;
}

export function vec2LengthSq(v: Vec2): number {
    return v.x * v.x + v.y * v.y;
}

export function vec2Length(v: Vec2): number {
    return Math.sqrt(vec2LengthSq(v));
}

export function vec2Normalize(v: Vec2): Vec2 {
    const len = vec2Length(v);
    if (len === 0) return vec2Zero();
    return { x: v.x / len, y: v.y / len };
}

/** Counter-clockwise perpendicular: (x, y) -> (-y, x) */
export function vec2Perp(v: Vec2): Vec2 {
    return { x: -v.y, y: v.x };
}

/**
 * Rotate a vector counter-clockwise about the origin.
 */
export function vec2Rotate(v: Vec2, angle: Angle): Vec2 {
    if (angle === 0) return vec2Clone(v);
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return {
        x: v.x * cos - v.y * sin,
        y: v.x * sin + v.y * cos
    };
}

export function vec2Distance(a: Vec2, b: Vec2): number {
    return vec2Length(vec2Sub(b, a));
}

export function vec2DistanceSq(a: Vec2, b: Vec2): number {
    return vec2LengthSq(vec2Sub(b, a));
}

export function vec2Equals(a: Vec2, b: Vec2, tolerance: number = 0): boolean {
    return Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance;
}
