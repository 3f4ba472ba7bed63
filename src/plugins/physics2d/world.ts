/**
 * 2D Physics World
 *
 * Owns grouped bodies under deterministic ids, advances them one time
 * step at a time and answers overlap queries between groups. Bounds are
 * declared but not enforced; wrapping or clamping is caller policy (see
 * rules.ts). Collision response is also the caller's.
 */

import { TIME_STEP } from '../../core/time-step';
import { Shape2D, Shape2DType, createCircle, createPolygon } from './shapes';
import { RigidBody2D, ReadonlyBody2D, BodyPredicate2D, integrateBody2D, cloneBody2D } from './rigid-body';
import { areColliding } from './collision';
import { Body2DView, createBody2DView } from './view';

// ============================================
// Types
// ============================================

/** Caller-defined group tag, compared with ===. */
export type Group2D = string | number;

/** "{timeSteps}-{objectsCreatedThisStep}" at insertion time. */
export type ObjectId = string;

export interface Dimensions2D {
    readonly width: number;
    readonly height: number;
}

export interface WorldObject2D<G extends Group2D> {
    readonly id: ObjectId;
    readonly group: G;
    readonly body: ReadonlyBody2D;
}

/**
 * Overlap between two objects. Bodies are copies taken at query time.
 */
export interface Collision2D<G extends Group2D> {
    readonly a: WorldObject2D<G>;
    readonly b: WorldObject2D<G>;
}

export interface ObjectView2D<G extends Group2D> {
    readonly id: ObjectId;
    readonly group: G;
    readonly view: Body2DView;
}

export type ObjectUpdate2D<G extends Group2D> = (body: RigidBody2D, id: ObjectId, group: G) => RigidBody2D;

interface WorldEntry<G extends Group2D> {
    group: G;
    body: RigidBody2D;
}

// ============================================
// World
// ============================================

/**
 * Objects are kept in insertion order, which is also ascending id order,
 * so every query is deterministic for a given table content.
 */
export class World2D<G extends Group2D> {
    readonly dimensions: Dimensions2D;

    /** Set while bodies are being advanced (read by the determinism guard). */
    _isSimulating: boolean = false;

    private objects: Map<ObjectId, WorldEntry<G>> = new Map();
    private steps: number = 0;
    private createdThisStep: number = 0;

    constructor(width: number, height: number, initialObjects: Iterable<readonly [G, RigidBody2D]> = []) {
        if (!Number.isFinite(width) || width < 0) {
            throw new Error(`World width must be a finite number >= 0, got ${width}`);
        }
        if (!Number.isFinite(height) || height < 0) {
            throw new Error(`World height must be a finite number >= 0, got ${height}`);
        }
        this.dimensions = Object.freeze({ width, height });

        for (const [group, body] of initialObjects) {
            this.addObject(group, body);
        }
    }

    /** Number of simulate() calls so far. */
    get timeSteps(): number {
        return this.steps;
    }

    /** Simulated seconds so far. */
    get elapsed(): number {
        return this.steps * TIME_STEP;
    }

    get objectCount(): number {
        return this.objects.size;
    }

    get isSimulating(): boolean {
        return this._isSimulating;
    }

    // ============================================
    // Insertion / Removal
    // ============================================

    /**
     * Insert a copy of `body`; later changes to the caller's body do not
     * reach the world.
     */
    addObject(group: G, body: ReadonlyBody2D): ObjectId {
        const id = `${this.steps}-${this.createdThisStep}`;
        this.createdThisStep++;
        this.objects.set(id, { group, body: cloneBody2D(body) });
        return id;
    }

    /** Unknown ids are ignored. Returns whether something was removed. */
    removeObject(id: ObjectId): boolean {
        return this.objects.delete(id);
    }

    removeObjects(ids: Iterable<ObjectId>): number {
        let removed = 0;
        for (const id of ids) {
            if (this.objects.delete(id)) removed++;
        }
        return removed;
    }

    /**
     * Remove every object in `groups` whose body matches `predicate`.
     * Objects in other groups are never tested.
     */
    removeObjectIf(groups: readonly G[], predicate: BodyPredicate2D): number {
        const doomed: ObjectId[] = [];
        for (const [id, entry] of this.objects) {
            if (groups.includes(entry.group) && predicate(entry.body)) {
                doomed.push(id);
            }
        }
        return this.removeObjects(doomed);
    }

    // ============================================
    // Queries
    // ============================================

    getObject(id: ObjectId): WorldObject2D<G> | undefined {
        const entry = this.objects.get(id);
        return entry ? { id, group: entry.group, body: entry.body } : undefined;
    }

    hasObject(id: ObjectId): boolean {
        return this.objects.has(id);
    }

    getObjects(groups: readonly G[]): WorldObject2D<G>[] {
        const result: WorldObject2D<G>[] = [];
        for (const [id, entry] of this.objects) {
            if (groups.includes(entry.group)) {
                result.push({ id, group: entry.group, body: entry.body });
            }
        }
        return result;
    }

    getMembersOfGroup(group: G): WorldObject2D<G>[] {
        return this.getObjects([group]);
    }

    getAllObjects(): WorldObject2D<G>[] {
        const result: WorldObject2D<G>[] = [];
        for (const [id, entry] of this.objects) {
            result.push({ id, group: entry.group, body: entry.body });
        }
        return result;
    }

    // ============================================
    // Bulk Updates
    // ============================================

    /**
     * Replace each body in `groups` with `update(body, id, group)`.
     * `update` must only touch the body it is given. A different body
     * returned from `update` is stored as a copy.
     */
    updateGroups(groups: readonly G[], update: ObjectUpdate2D<G>): void {
        for (const [id, entry] of this.objects) {
            if (groups.includes(entry.group)) {
                applyUpdate(entry, id, update);
            }
        }
    }

    /** Unknown ids are ignored. Returns whether the object existed. */
    updateObject(id: ObjectId, update: ObjectUpdate2D<G>): boolean {
        const entry = this.objects.get(id);
        if (!entry) return false;
        applyUpdate(entry, id, update);
        return true;
    }

    updateAll(update: ObjectUpdate2D<G>): void {
        for (const [id, entry] of this.objects) {
            applyUpdate(entry, id, update);
        }
    }

    // ============================================
    // Simulation
    // ============================================

    /**
     * Integrate every body once and start a new id step.
     */
    simulate(): void {
        const wasSimulating = this._isSimulating;
        this._isSimulating = true;
        try {
            for (const entry of this.objects.values()) {
                integrateBody2D(entry.body);
            }
        } finally {
            this._isSimulating = wasSimulating;
        }
        this.steps++;
        this.createdThisStep = 0;
    }

    /**
     * All colliding pairs from groupA x groupB, ordered by (a.id, b.id).
     * With groupA === groupB every ordered pair is tested, self-pairs
     * included; callers dedupe if that matters.
     */
    onOverlap(groupA: G, groupB: G): Collision2D<G>[] {
        const membersA = this.getMembersOfGroup(groupA);
        if (membersA.length === 0) return [];
        const membersB = groupA === groupB ? membersA : this.getMembersOfGroup(groupB);

        const collisions: Collision2D<G>[] = [];
        for (const a of membersA) {
            for (const b of membersB) {
                if (areColliding(a.body, b.body)) {
                    collisions.push({ a: snapshotObject(a), b: snapshotObject(b) });
                }
            }
        }
        return collisions;
    }

    /** Render views for every object, in id order. */
    viewData(): ObjectView2D<G>[] {
        const views: ObjectView2D<G>[] = [];
        for (const [id, entry] of this.objects) {
            views.push({ id, group: entry.group, view: createBody2DView(entry.body) });
        }
        return views;
    }

    // ============================================
    // Internal (state restore)
    // ============================================

    /** Internal - use loadWorldState2D(). */
    _restoreObject(id: ObjectId, group: G, body: RigidBody2D): void {
        this.objects.set(id, { group, body });
    }

    /** Internal - use loadWorldState2D(). */
    _restoreCounters(timeSteps: number, createdThisStep: number): void {
        this.steps = timeSteps;
        this.createdThisStep = createdThisStep;
    }

    /** Internal - use saveWorldState2D(). */
    _counters(): { timeSteps: number; createdThisStep: number } {
        return { timeSteps: this.steps, createdThisStep: this.createdThisStep };
    }
}

/**
 * Order ids by (timeStep, counter) numerically; "2-10" sorts after "2-9".
 */
export function compareObjectIds(a: ObjectId, b: ObjectId): number {
    const [stepA, countA] = parseObjectId(a);
    const [stepB, countB] = parseObjectId(b);
    return stepA !== stepB ? stepA - stepB : countA - countB;
}

function parseObjectId(id: ObjectId): [number, number] {
    const dash = id.indexOf('-');
    return [Number(id.slice(0, dash)), Number(id.slice(dash + 1))];
}

function applyUpdate<G extends Group2D>(entry: WorldEntry<G>, id: ObjectId, update: ObjectUpdate2D<G>): void {
    const next = update(entry.body, id, entry.group);
    entry.body = next === entry.body ? next : cloneBody2D(next);
}

function snapshotObject<G extends Group2D>(object: WorldObject2D<G>): WorldObject2D<G> {
    return { id: object.id, group: object.group, body: cloneBody2D(object.body) };
}

export function createWorld2D<G extends Group2D>(
    width: number,
    height: number,
    initialObjects: Iterable<readonly [G, RigidBody2D]> = []
): World2D<G> {
    return new World2D<G>(width, height, initialObjects);
}

// ============================================
// State Serialization
// ============================================

export type ShapeState2D =
    | { type: Shape2DType.Circle; radius: number }
    | { type: Shape2DType.Polygon; vertices: Array<{ x: number; y: number }> };

/**
 * Complete object state for snapshots, flattened to plain numbers.
 */
export interface ObjectState2D<G extends Group2D> {
    id: ObjectId;
    group: G;
    shape: ShapeState2D;

    // Verlet pairs
    px: number;
    py: number;
    ppx: number;
    ppy: number;
    heading: number;
    headingPrevious: number;

    age: number;
}

export interface WorldState2D<G extends Group2D> {
    width: number;
    height: number;
    timeSteps: number;
    objectsCreatedThisStep: number;
    objects: ObjectState2D<G>[];
}

function serializeShape(shape: Shape2D): ShapeState2D {
    if (shape.type === Shape2DType.Circle) {
        return { type: Shape2DType.Circle, radius: shape.radius };
    }
    return { type: Shape2DType.Polygon, vertices: shape.vertices.map(v => ({ x: v.x, y: v.y })) };
}

function deserializeShape(state: ShapeState2D): Shape2D {
    switch (state.type) {
        case Shape2DType.Circle:
            return createCircle(state.radius);
        case Shape2DType.Polygon:
            return createPolygon(state.vertices);
        default:
            throw new Error(`Unknown shape type in snapshot: ${JSON.stringify(state)}`);
    }
}

export function saveWorldState2D<G extends Group2D>(world: World2D<G>): WorldState2D<G> {
    const { timeSteps, createdThisStep } = world._counters();
    return {
        width: world.dimensions.width,
        height: world.dimensions.height,
        timeSteps,
        objectsCreatedThisStep: createdThisStep,
        objects: world.getAllObjects().map(({ id, group, body }) => ({
            id,
            group,
            shape: serializeShape(body.shape),
            px: body.position.x,
            py: body.position.y,
            ppx: body.positionPrevious.x,
            ppy: body.positionPrevious.y,
            heading: body.heading,
            headingPrevious: body.headingPrevious,
            age: body.age,
        })),
    };
}

function isCounter(value: number): boolean {
    return Number.isInteger(value) && value >= 0;
}

/**
 * Throw unless every restored id is well formed, unique and allocated
 * before the restored counters, so later inserts cannot reuse one.
 */
function validateSnapshotIds<G extends Group2D>(state: WorldState2D<G>): void {
    if (!isCounter(state.timeSteps) || !isCounter(state.objectsCreatedThisStep)) {
        throw new Error(
            `Invalid id counters in snapshot: timeSteps=${state.timeSteps}, ` +
            `objectsCreatedThisStep=${state.objectsCreatedThisStep}`
        );
    }
    const seen = new Set<ObjectId>();
    for (const { id } of state.objects) {
        if (!/^\d+-\d+$/.test(id)) {
            throw new Error(`Malformed object id in snapshot: ${id}`);
        }
        const [step, count] = parseObjectId(id);
        if (seen.has(id)) {
            throw new Error(`Duplicate object id in snapshot: ${id}`);
        }
        seen.add(id);
        if (step > state.timeSteps || (step === state.timeSteps && count >= state.objectsCreatedThisStep)) {
            throw new Error(
                `Object id ${id} in snapshot is not below the restored counters ` +
                `${state.timeSteps}-${state.objectsCreatedThisStep}`
            );
        }
    }
}

/**
 * Rebuild a world from a snapshot. Object order and id counters are
 * restored, so new ids never collide with restored ones.
 */
export function loadWorldState2D<G extends Group2D>(state: WorldState2D<G>): World2D<G> {
    validateSnapshotIds(state);
    const world = new World2D<G>(state.width, state.height);
    for (const os of state.objects) {
        world._restoreObject(os.id, os.group, {
            shape: deserializeShape(os.shape),
            position: { x: os.px, y: os.py },
            positionPrevious: { x: os.ppx, y: os.ppy },
            heading: os.heading,
            headingPrevious: os.headingPrevious,
            age: os.age,
        });
    }
    world._restoreCounters(state.timeSteps, state.objectsCreatedThisStep);
    return world;
}

// ============================================
// State Hash
// ============================================

const hashView = new DataView(new ArrayBuffer(8));

function mix(hash: number, value: number): number {
    return ((hash << 5) - hash + value) >>> 0;
}

// Hash the IEEE-754 bits so equal hashes mean bit-identical state
function mixNumber(hash: number, value: number): number {
    hashView.setFloat64(0, value);
    hash = mix(hash, hashView.getUint32(0));
    return mix(hash, hashView.getUint32(4));
}

function mixString(hash: number, value: string): number {
    for (let i = 0; i < value.length; i++) {
        hash = mix(hash, value.charCodeAt(i));
    }
    return mix(hash, value.length);
}

/**
 * Hash every id, group, shape and motion value in the world.
 */
export function computeWorldHash2D<G extends Group2D>(world: World2D<G>): number {
    const { timeSteps, createdThisStep } = world._counters();
    let hash = mix(mix(0, timeSteps), createdThisStep);

    for (const { id, group, body } of world.getAllObjects()) {
        hash = mixString(hash, id);
        const tag: Group2D = group;
        hash = typeof tag === 'number' ? mixNumber(hash, tag) : mixString(hash, tag);

        const shape = body.shape;
        hash = mix(hash, shape.type);
        if (shape.type === Shape2DType.Circle) {
            hash = mixNumber(hash, shape.radius);
        } else {
            for (const v of shape.vertices) {
                hash = mixNumber(mixNumber(hash, v.x), v.y);
            }
        }

        hash = mixNumber(hash, body.position.x);
        hash = mixNumber(hash, body.position.y);
        hash = mixNumber(hash, body.positionPrevious.x);
        hash = mixNumber(hash, body.positionPrevious.y);
        hash = mixNumber(hash, body.heading);
        hash = mixNumber(hash, body.headingPrevious);
        hash = mixNumber(hash, body.age);
    }

    return hash;
}
