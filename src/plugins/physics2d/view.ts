/**
 * Render Views
 *
 * World-space snapshots of bodies for a renderer. A view shares nothing
 * mutable with the body it was taken from.
 */

import type { Vec2 } from '../../math/vec';
import type { Angle } from '../../math/angle';
import { Shape2DType } from './shapes';
import { ReadonlyBody2D, body2DWorldPoints } from './rigid-body';

export interface PolygonShapeView {
    readonly type: Shape2DType.Polygon;
    readonly vertices: readonly Vec2[];
}

export interface CircleShapeView {
    readonly type: Shape2DType.Circle;
    readonly radius: number;
    readonly center: Vec2;
}

export type ShapeView2D = PolygonShapeView | CircleShapeView;

export interface Body2DView {
    readonly position: Vec2;
    readonly heading: Angle;
    readonly shape: ShapeView2D;
}

export function createBody2DView(body: ReadonlyBody2D): Body2DView {
    const position = { x: body.position.x, y: body.position.y };
    const shape: ShapeView2D = body.shape.type === Shape2DType.Circle
        ? { type: Shape2DType.Circle, radius: body.shape.radius, center: position }
        : { type: Shape2DType.Polygon, vertices: body2DWorldPoints(body) };
    return { position, heading: body.heading, shape };
}
