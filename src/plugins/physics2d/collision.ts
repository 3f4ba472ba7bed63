/**
 * 2D Collision Detection
 *
 * Overlap predicate only, no contact manifold and no response:
 * - Direct distance for circle-circle
 * - SAT (Separating Axis Theorem) for polygon-polygon
 * - Polygon-circle is not tested and always reports no collision
 *
 * Touching counts as colliding for every supported pair.
 */

import { Vec2, vec2Sub, vec2Perp, vec2Normalize, vec2Dot, vec2Distance, vec2LengthSq } from '../../math/vec';
import { Shape2DType, Edge2D } from './shapes';
import { ReadonlyBody2D, body2DWorldPoints, body2DWorldEdges } from './rigid-body';

// ============================================
// Projection
// ============================================

/** Closed range of projected distances along an axis. */
export interface Interval1D {
    min: number;
    max: number;
}

/**
 * Unit normal of an edge, or null for a zero-length edge.
 */
export function edgeNormal(edge: Edge2D): Vec2 | null {
    const direction = vec2Sub(edge.end, edge.start);
    if (vec2LengthSq(direction) === 0) return null;
    return vec2Normalize(vec2Perp(direction));
}

/**
 * Project points onto an axis through the origin.
 * Returns null when there are no points.
 */
export function projectPoints(points: readonly Vec2[], axis: Vec2): Interval1D | null {
    if (points.length === 0) return null;
    let min = Infinity;
    let max = -Infinity;
    for (const p of points) {
        const d = vec2Dot(p, axis);
        if (d < min) min = d;
        if (d > max) max = d;
    }
    return { min, max };
}

/**
 * Disjoint intervals separate. Shared endpoints do not.
 */
export function intervalsSeparated(a: Interval1D, b: Interval1D): boolean {
    return a.max < b.min || b.max < a.min;
}

/**
 * Find an axis, among the normals of both edge sets, on which the two
 * point sets project to disjoint intervals. Null if none separates.
 */
export function findSeparatingAxis(
    pointsA: readonly Vec2[],
    edgesA: readonly Edge2D[],
    pointsB: readonly Vec2[],
    edgesB: readonly Edge2D[]
): Vec2 | null {
    for (const edge of [...edgesA, ...edgesB]) {
        const axis = edgeNormal(edge);
        if (!axis) continue;

        const projA = projectPoints(pointsA, axis);
        const projB = projectPoints(pointsB, axis);
        // Nothing to compare on this axis
        if (!projA || !projB) continue;

        if (intervalsSeparated(projA, projB)) return axis;
    }
    return null;
}

// ============================================
// Narrow Phase
// ============================================

/**
 * Circle vs Circle: centers no farther apart than the sum of the radii.
 */
function circlesColliding(a: ReadonlyBody2D, radiusA: number, b: ReadonlyBody2D, radiusB: number): boolean {
    return vec2Distance(a.position, b.position) <= radiusA + radiusB;
}

/**
 * Polygon vs Polygon via SAT in world space.
 */
function polygonsColliding(a: ReadonlyBody2D, b: ReadonlyBody2D): boolean {
    const axis = findSeparatingAxis(
        body2DWorldPoints(a),
        body2DWorldEdges(a),
        body2DWorldPoints(b),
        body2DWorldEdges(b)
    );

    if (collisionDebugEnabled) {
        if (axis) {
            console.log(`[physics2d] SAT separated on axis (${axis.x.toFixed(4)}, ${axis.y.toFixed(4)})`);
        } else {
            console.log('[physics2d] SAT found no separating axis: colliding');
        }
    }

    return axis === null;
}

/**
 * Whether two bodies overlap, dispatching on the pair of shape types.
 */
export function areColliding(a: ReadonlyBody2D, b: ReadonlyBody2D): boolean {
    const shapeA = a.shape;
    const shapeB = b.shape;

    if (shapeA.type === Shape2DType.Circle && shapeB.type === Shape2DType.Circle) {
        return circlesColliding(a, shapeA.radius, b, shapeB.radius);
    }

    if (shapeA.type === Shape2DType.Polygon && shapeB.type === Shape2DType.Polygon) {
        return polygonsColliding(a, b);
    }

    // Polygon-circle overlap is not implemented
    if (collisionDebugEnabled) {
        console.log('[physics2d] polygon-circle pair skipped: reported as not colliding');
    }
    return false;
}

// ============================================
// Debug
// ============================================

let collisionDebugEnabled = false;

export function enableCollisionDebug(enabled: boolean): void {
    collisionDebugEnabled = enabled;
}
