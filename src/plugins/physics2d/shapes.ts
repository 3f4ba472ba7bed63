/**
 * 2D Physics Shapes
 *
 * Defines 2D collision shapes: Circle and Polygon.
 * Shapes live in the body's local frame (centered on the origin) and are
 * frozen on construction; world placement comes from the owning body.
 */

import { Vec2, vec2, vec2Add, vec2Rotate, vec2Length } from '../../math/vec';
import { Angle, TWO_PI } from '../../math/angle';

// ============================================
// Types
// ============================================

export enum Shape2DType {
    Circle = 0,
    Polygon = 1,
}

export interface CircleShape {
    readonly type: Shape2DType.Circle;
    readonly radius: number;
}

export interface PolygonShape {
    readonly type: Shape2DType.Polygon;
    /** Closed loop; the last vertex connects back to the first. */
    readonly vertices: readonly Vec2[];
}

export type Shape2D = CircleShape | PolygonShape;

/** Segment between two consecutive polygon vertices. */
export interface Edge2D {
    readonly start: Vec2;
    readonly end: Vec2;
}

// Squares get a 1/8 turn so they sit flat instead of on a corner
const SQUARE_OFFSET: Angle = TWO_PI / 8;

// ============================================
// Shape Factories
// ============================================

/**
 * Create a circle shape.
 */
export function createCircle(radius: number): CircleShape {
    if (!Number.isFinite(radius) || radius < 0) {
        throw new Error(`Circle radius must be a finite number >= 0, got ${radius}`);
    }
    const shape: CircleShape = { type: Shape2DType.Circle, radius };
    return Object.freeze(shape);
}

/**
 * Create a polygon from caller-supplied local-frame vertices.
 *
 * The list is taken verbatim. Convexity, winding and self-intersection are
 * not checked; collision results for malformed polygons are undefined.
 */
export function createPolygon(vertices: readonly Vec2[]): PolygonShape {
    const shape: PolygonShape = {
        type: Shape2DType.Polygon,
        vertices: Object.freeze(vertices.map(v => vec2(v.x, v.y))),
    };
    return Object.freeze(shape);
}

/**
 * Create a regular polygon with `sides` vertices at distance `radius`
 * from the origin. Vertex k sits at angle k * (2PI / sides).
 */
export function createRegularPolygon(sides: number, radius: number): PolygonShape {
    if (!Number.isInteger(sides) || sides < 3) {
        throw new Error(`Regular polygon needs an integer number of sides >= 3, got ${sides}`);
    }
    if (!Number.isFinite(radius) || radius < 0) {
        throw new Error(`Regular polygon radius must be a finite number >= 0, got ${radius}`);
    }

    const offset = sides === 4 ? SQUARE_OFFSET : 0;
    const step = TWO_PI / sides;
    const vertices: Vec2[] = [];
    for (let k = 0; k < sides; k++) {
        const angle = k * step + offset;
        vertices.push(vec2(radius * Math.cos(angle), radius * Math.sin(angle)));
    }
    return createPolygon(vertices);
}

export function createTriangle(radius: number): PolygonShape {
    return createRegularPolygon(3, radius);
}

/** Axis-aligned square; its half-diagonal is `radius`. */
export function createSquare(radius: number): PolygonShape {
    return createRegularPolygon(4, radius);
}

export function createPentagon(radius: number): PolygonShape {
    return createRegularPolygon(5, radius);
}

export function createHexagon(radius: number): PolygonShape {
    return createRegularPolygon(6, radius);
}

// ============================================
// World-Space Geometry
// ============================================

/**
 * Vertices rotated by `heading` about the local origin, then translated
 * by `position`. Circles have no vertices.
 */
export function shapeWorldPoints(shape: Shape2D, position: Vec2, heading: Angle): Vec2[] {
    if (shape.type === Shape2DType.Circle) return [];
    return shape.vertices.map(v => vec2Add(vec2Rotate(v, heading), position));
}

/**
 * Edges between consecutive world-space vertices, including the closing
 * edge from the last vertex back to the first.
 */
export function shapeWorldEdges(shape: Shape2D, position: Vec2, heading: Angle): Edge2D[] {
    return pointsToEdges(shapeWorldPoints(shape, position, heading));
}

export function pointsToEdges(points: readonly Vec2[]): Edge2D[] {
    const edges: Edge2D[] = [];
    const count = points.length;
    for (let i = 0; i < count; i++) {
        edges.push({ start: points[i], end: points[(i + 1) % count] });
    }
    return edges;
}

/**
 * Distance from the local origin to the farthest point of the shape.
 */
export function shapeBoundingRadius(shape: Shape2D): number {
    if (shape.type === Shape2DType.Circle) return shape.radius;
    let max = 0;
    for (const v of shape.vertices) {
        const d = vec2Length(v);
        if (d > max) max = d;
    }
    return max;
}
