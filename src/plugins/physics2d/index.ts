/**
 * Physics 2D Module
 *
 * Verlet-integrated 2D bodies, SAT overlap tests and a grouped world
 * container. Detection only; collision response belongs to the caller.
 */

// Shapes
export {
    Shape2DType,
    createCircle,
    createPolygon,
    createRegularPolygon,
    createTriangle,
    createSquare,
    createPentagon,
    createHexagon,
    shapeWorldPoints,
    shapeWorldEdges,
    pointsToEdges,
    shapeBoundingRadius
} from './shapes';
export type { CircleShape, PolygonShape, Shape2D, Edge2D } from './shapes';

// Rigid Body
export {
    createBody2D,
    createPolygonBody2D,
    createCircleBody2D,
    cloneBody2D,
    integrateBody2D,
    getBody2DVelocity,
    getBody2DSpeed,
    setBody2DPosition,
    setBody2DVelocity,
    addBody2DVelocity,
    getBody2DAngularSpeed,
    setBody2DHeading,
    setBody2DAngularSpeed,
    addBody2DAngularSpeed,
    getBody2DDirection,
    body2DWorldPoints,
    body2DWorldEdges
} from './rigid-body';
export type { RigidBody2D, ReadonlyBody2D, BodyUpdate2D, BodyPredicate2D } from './rigid-body';

// Collision Detection
export {
    areColliding,
    edgeNormal,
    projectPoints,
    intervalsSeparated,
    findSeparatingAxis,
    enableCollisionDebug
} from './collision';
export type { Interval1D } from './collision';

// Render Views
export { createBody2DView } from './view';
export type { Body2DView, ShapeView2D, PolygonShapeView, CircleShapeView } from './view';

// Physics World
export {
    World2D,
    createWorld2D,
    compareObjectIds,
    saveWorldState2D,
    loadWorldState2D,
    computeWorldHash2D
} from './world';
export type {
    Group2D,
    ObjectId,
    Dimensions2D,
    WorldObject2D,
    Collision2D,
    ObjectView2D,
    ObjectUpdate2D,
    ShapeState2D,
    ObjectState2D,
    WorldState2D
} from './world';

// Bounds Rules
export { wrapAround, clampToBounds, isOutOfBounds, isOlderThan, composeRules } from './rules';

// Tick System
export { Physics2DSystem } from './system';
export type { Physics2DSystemConfig, RuleOptions, Reaction2D, CollisionHandler2D, StepResult2D } from './system';
