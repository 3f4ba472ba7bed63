/**
 * 2D Rigid Body
 *
 * A shape plus Verlet motion state. Velocity is never stored: it is the
 * difference between the current and previous position divided by the
 * time step. Setters rewrite only the "previous" half of a pair so the
 * body keeps its place and picks up the new rate on the next integrate.
 *
 * All setters mutate the body and return it, so they can be used directly
 * as update rules: `world.updateGroups(['ship'], b => setBody2DVelocity(b, v))`.
 */

import { Vec2, vec2Add, vec2Sub, vec2Scale, vec2Length, vec2Clone } from '../../math/vec';
import { Angle, angleToDirection } from '../../math/angle';
import { TIME_STEP, rateToStep, stepToRate } from '../../core/time-step';
import { Shape2D, CircleShape, PolygonShape, Edge2D, shapeWorldPoints, shapeWorldEdges } from './shapes';

// ============================================
// Rigid Body Interface
// ============================================

export interface RigidBody2D {
    readonly shape: Shape2D;

    // Verlet position pair
    position: Vec2;
    positionPrevious: Vec2;

    // Verlet heading pair (radians)
    heading: Angle;
    headingPrevious: Angle;

    /** Simulated seconds since creation; only integrate advances it. */
    age: number;
}

/** Read-only view of a body handed out by world queries. */
export type ReadonlyBody2D = Readonly<RigidBody2D>;

export type BodyUpdate2D = (body: RigidBody2D) => RigidBody2D;
export type BodyPredicate2D = (body: ReadonlyBody2D) => boolean;

// ============================================
// Body Creation
// ============================================

/**
 * Create a body at rest.
 */
export function createBody2D(shape: Shape2D, position: Vec2, heading: Angle = 0): RigidBody2D {
    return {
        shape,
        position: vec2Clone(position),
        positionPrevious: vec2Clone(position),
        heading,
        headingPrevious: heading,
        age: 0,
    };
}

export function createPolygonBody2D(shape: PolygonShape, position: Vec2, heading: Angle = 0): RigidBody2D {
    return createBody2D(shape, position, heading);
}

// Orientation of a circle is kept so direction helpers still work
export function createCircleBody2D(shape: CircleShape, position: Vec2, heading: Angle = 0): RigidBody2D {
    return createBody2D(shape, position, heading);
}

export function cloneBody2D(body: ReadonlyBody2D): RigidBody2D {
    return {
        shape: body.shape,
        position: vec2Clone(body.position),
        positionPrevious: vec2Clone(body.positionPrevious),
        heading: body.heading,
        headingPrevious: body.headingPrevious,
        age: body.age,
    };
}

// ============================================
// Integration
// ============================================

/**
 * Advance one time step: re-apply the last step's displacement and
 * rotation, then age the body by TIME_STEP.
 */
export function integrateBody2D(body: RigidBody2D): RigidBody2D {
    const displacement = vec2Sub(body.position, body.positionPrevious);
    const rotation = body.heading - body.headingPrevious;

    body.positionPrevious = body.position;
    body.position = vec2Add(body.position, displacement);

    body.headingPrevious = body.heading;
    body.heading = body.heading + rotation;

    body.age += TIME_STEP;
    return body;
}

// ============================================
// Linear Motion
// ============================================

/** Velocity in units per second. */
export function getBody2DVelocity(body: ReadonlyBody2D): Vec2 {
    const delta = vec2Sub(body.position, body.positionPrevious);
    return { x: stepToRate(delta.x), y: stepToRate(delta.y) };
}

export function getBody2DSpeed(body: ReadonlyBody2D): number {
    return vec2Length(getBody2DVelocity(body));
}

/**
 * Move the body, keeping its current velocity.
 */
export function setBody2DPosition(body: RigidBody2D, position: Vec2): RigidBody2D {
    const delta = vec2Sub(body.position, body.positionPrevious);
    body.position = vec2Clone(position);
    body.positionPrevious = vec2Sub(body.position, delta);
    return body;
}

export function setBody2DVelocity(body: RigidBody2D, velocity: Vec2): RigidBody2D {
    body.positionPrevious = vec2Sub(body.position, vec2Scale(velocity, TIME_STEP));
    return body;
}

export function addBody2DVelocity(body: RigidBody2D, delta: Vec2): RigidBody2D {
    body.positionPrevious = vec2Sub(body.positionPrevious, vec2Scale(delta, TIME_STEP));
    return body;
}

// ============================================
// Angular Motion
// ============================================

/** Angular speed in radians per second, counter-clockwise positive. */
export function getBody2DAngularSpeed(body: ReadonlyBody2D): number {
    return stepToRate(body.heading - body.headingPrevious);
}

/**
 * Point the body along `heading`. Angular speed drops to zero.
 */
export function setBody2DHeading(body: RigidBody2D, heading: Angle): RigidBody2D {
    body.heading = heading;
    body.headingPrevious = heading;
    return body;
}

export function setBody2DAngularSpeed(body: RigidBody2D, angularSpeed: number): RigidBody2D {
    body.headingPrevious = body.heading - rateToStep(angularSpeed);
    return body;
}

export function addBody2DAngularSpeed(body: RigidBody2D, delta: number): RigidBody2D {
    body.headingPrevious = body.headingPrevious - rateToStep(delta);
    return body;
}

/** Unit vector the body is facing. */
export function getBody2DDirection(body: ReadonlyBody2D): Vec2 {
    return angleToDirection(body.heading);
}

// ============================================
// World-Space Geometry
// ============================================

export function body2DWorldPoints(body: ReadonlyBody2D): Vec2[] {
    return shapeWorldPoints(body.shape, body.position, body.heading);
}

export function body2DWorldEdges(body: ReadonlyBody2D): Edge2D[] {
    return shapeWorldEdges(body.shape, body.position, body.heading);
}
