/**
 * Physics2D System
 *
 * Composes one simulation tick from caller-supplied policy:
 * - Rules update bodies of selected groups (ascending order)
 * - Removal predicates drop bodies of selected groups
 * - The world integrates every body once
 * - Collision handlers turn overlaps into reaction commands
 * - Reactions are applied after every overlap query has run
 *
 * The world keeps no reference to the system; one system can drive any
 * number of worlds.
 */

import {
    World2D,
    Group2D,
    ObjectId,
    ObjectUpdate2D,
    Collision2D,
    compareObjectIds
} from './world';
import { RigidBody2D, BodyUpdate2D, BodyPredicate2D } from './rigid-body';

// ============================================
// Types
// ============================================

/** Deferred world change produced by a collision handler. */
export type Reaction2D<G extends Group2D> =
    | { type: 'add'; group: G; body: RigidBody2D }
    | { type: 'remove'; id: ObjectId }
    | { type: 'update'; id: ObjectId; update: BodyUpdate2D };

export type CollisionHandler2D<G extends Group2D> =
    (collision: Collision2D<G>) => Reaction2D<G> | Reaction2D<G>[] | void;

/**
 * Physics2D System configuration.
 */
export interface Physics2DSystemConfig {
    /**
     * For handlers registered on (G, G): report each unordered pair once
     * (true, default) or in both orders (false). Self-pairs are always
     * skipped.
     */
    dedupeSameGroup?: boolean;
}

export interface RuleOptions {
    /** Execution order among rules (lower = earlier) */
    order?: number;
}

export interface StepResult2D<G extends Group2D> {
    collisions: Collision2D<G>[];
    reactions: Reaction2D<G>[];
}

interface RuleEntry<G extends Group2D> {
    groups: readonly G[] | 'all';
    update: ObjectUpdate2D<G>;
    order: number;
}

interface RemovalEntry<G extends Group2D> {
    groups: readonly G[];
    predicate: BodyPredicate2D;
}

interface HandlerEntry<G extends Group2D> {
    groupA: G;
    groupB: G;
    handler: CollisionHandler2D<G>;
}

function isThenable(value: unknown): boolean {
    return typeof value === 'object' && value !== null && 'then' in value;
}

function assertSync(value: unknown, what: string): void {
    if (isThenable(value)) {
        throw new Error(
            `${what} returned a Promise. Async ${what.toLowerCase()}s are not allowed ` +
            `as they break determinism. Remove 'await' from it.`
        );
    }
}

// ============================================
// System
// ============================================

/**
 * @example
 * const system = new Physics2DSystem<'ship' | 'rock' | 'bullet'>();
 * system.addRule('all', wrapAround(world.dimensions));
 * system.addRemoval(['bullet'], isOlderThan(2));
 * system.onCollision('bullet', 'rock', ({ a, b }) => [
 *     { type: 'remove', id: a.id },
 *     { type: 'remove', id: b.id },
 * ]);
 *
 * // once per frame
 * system.step(world);
 */
export class Physics2DSystem<G extends Group2D> {
    private rules: RuleEntry<G>[] = [];
    private removals: RemovalEntry<G>[] = [];
    private handlers: HandlerEntry<G>[] = [];

    /** Rule counter for default ordering */
    private nextRuleId: number = 0;

    private readonly dedupeSameGroup: boolean;

    constructor(config: Physics2DSystemConfig = {}) {
        this.dedupeSameGroup = config.dedupeSameGroup ?? true;
    }

    /**
     * Add an update rule for some groups, or 'all'.
     *
     * @returns Function to remove the rule
     */
    addRule(groups: readonly G[] | 'all', update: ObjectUpdate2D<G>, options: RuleOptions = {}): () => void {
        const entry: RuleEntry<G> = {
            groups,
            update,
            order: options.order ?? this.nextRuleId++
        };
        this.rules.push(entry);
        // Stable sort keeps registration order for equal `order`
        this.rules.sort((a, b) => a.order - b.order);
        return () => removeEntry(this.rules, entry);
    }

    addRemoval(groups: readonly G[], predicate: BodyPredicate2D): () => void {
        const entry: RemovalEntry<G> = { groups, predicate };
        this.removals.push(entry);
        return () => removeEntry(this.removals, entry);
    }

    /**
     * Register a handler for overlaps between two groups. The handler sees
     * collisions with `a` from groupA and `b` from groupB.
     */
    onCollision(groupA: G, groupB: G, handler: CollisionHandler2D<G>): () => void {
        const entry: HandlerEntry<G> = { groupA, groupB, handler };
        this.handlers.push(entry);
        return () => removeEntry(this.handlers, entry);
    }

    /**
     * Run one tick on `world`.
     */
    step(world: World2D<G>): StepResult2D<G> {
        const wasSimulating = world._isSimulating;
        world._isSimulating = true;
        try {
            this.applyRules(world);

            for (const removal of this.removals) {
                world.removeObjectIf(removal.groups, removal.predicate);
            }

            world.simulate();

            const collisions: Collision2D<G>[] = [];
            const reactions: Reaction2D<G>[] = [];
            for (const entry of this.handlers) {
                for (const collision of this.collisionsFor(world, entry)) {
                    collisions.push(collision);
                    const result = entry.handler(collision);
                    assertSync(result, 'Collision handler');
                    if (!result) continue;
                    if (Array.isArray(result)) reactions.push(...result);
                    else reactions.push(result);
                }
            }

            // Fire reactions AFTER all detection is complete
            for (const reaction of reactions) {
                applyReaction(world, reaction);
            }

            return { collisions, reactions };
        } catch (error) {
            console.error('[physics2d] Error during system step:', error);
            throw error;
        } finally {
            world._isSimulating = wasSimulating;
        }
    }

    private applyRules(world: World2D<G>): void {
        for (const rule of this.rules) {
            const update: ObjectUpdate2D<G> = (body, id, group) => {
                const next = rule.update(body, id, group);
                assertSync(next, 'Rule');
                return next;
            };
            if (rule.groups === 'all') world.updateAll(update);
            else world.updateGroups(rule.groups, update);
        }
    }

    private collisionsFor(world: World2D<G>, entry: HandlerEntry<G>): Collision2D<G>[] {
        const collisions = world.onOverlap(entry.groupA, entry.groupB);
        if (entry.groupA !== entry.groupB) return collisions;
        return collisions.filter(({ a, b }) => {
            const cmp = compareObjectIds(a.id, b.id);
            return this.dedupeSameGroup ? cmp < 0 : cmp !== 0;
        });
    }
}

function applyReaction<G extends Group2D>(world: World2D<G>, reaction: Reaction2D<G>): void {
    switch (reaction.type) {
        case 'add':
            world.addObject(reaction.group, reaction.body);
            break;
        case 'remove':
            world.removeObject(reaction.id);
            break;
        case 'update':
            world.updateObject(reaction.id, reaction.update);
            break;
    }
}

function removeEntry<T>(entries: T[], entry: T): void {
    const index = entries.indexOf(entry);
    if (index !== -1) entries.splice(index, 1);
}
