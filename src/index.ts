/**
 * orbit2d - Minimal 2D Rigid-Body Physics Core
 *
 * Features:
 * - Verlet integration on a fixed 1/60 s time step
 * - Circle and convex polygon shapes with SAT overlap tests
 * - Grouped world container with deterministic ids and overlap queries
 * - Render views decoupled from simulation state
 */

export * from './math';
export * from './core';
export {
    Shape2DType,
    createCircle,
    createPolygon,
    createRegularPolygon,
    createTriangle,
    createSquare,
    createPentagon,
    createHexagon,
    createBody2D,
    createPolygonBody2D,
    createCircleBody2D,
    setBody2DPosition,
    setBody2DVelocity,
    addBody2DVelocity,
    setBody2DHeading,
    setBody2DAngularSpeed,
    getBody2DVelocity,
    getBody2DAngularSpeed,
    areColliding,
    World2D,
    createWorld2D,
    Physics2DSystem
} from './plugins/physics2d';
export type {
    Shape2D,
    RigidBody2D,
    Body2DView,
    Group2D,
    ObjectId,
    Collision2D,
    Reaction2D
} from './plugins/physics2d';
export { enableDeterminismGuard, disableDeterminismGuard } from './plugins/determinism-guard';
export * as physics2d from './plugins/physics2d';
