/**
 * Determinism Guard
 *
 * Warns developers when non-deterministic globals are read while a world
 * is simulating (inside World2D.simulate or Physics2DSystem.step).
 * Randomness and time belong to the caller and should be passed in as
 * already-generated values.
 */

import type { World2D, Group2D } from './physics2d/world';

interface OriginalFunctions {
    mathRandom: typeof Math.random;
    dateNow: typeof Date.now;
    performanceNow?: () => number;
}

let originalFunctions: OriginalFunctions | null = null;
/** Only the simulating flag is read */
let installedWorld: Pick<World2D<Group2D>, 'isSimulating'> | null = null;
const warnedFunctions: Set<string> = new Set();

function isSimulating(): boolean {
    return installedWorld?.isSimulating ?? false;
}

function warnOnce(key: string, message: string) {
    if (!warnedFunctions.has(key)) {
        warnedFunctions.add(key);
        console.warn(message);
    }
}

/**
 * Enable determinism guard for a world.
 * Warns when dangerous functions are called during simulation.
 *
 * @example
 * const world = createWorld2D<Group>(800, 600);
 * enableDeterminismGuard(world);
 */
export function enableDeterminismGuard<G extends Group2D>(world: World2D<G>): void {
    if (installedWorld) {
        console.warn('[determinism] Guard already installed for another world');
        return;
    }

    installedWorld = world;
    warnedFunctions.clear();

    const originals: OriginalFunctions = {
        mathRandom: Math.random,
        dateNow: Date.now,
    };
    originalFunctions = originals;

    Math.random = function(): number {
        if (isSimulating()) {
            warnOnce('Math.random',
                '[determinism] Math.random() called during simulation.\n' +
                '   Generate random values outside the tick and pass them in.'
            );
        }
        return originals.mathRandom();
    };

    Date.now = function(): number {
        if (isSimulating()) {
            warnOnce('Date.now',
                '[determinism] Date.now() called during simulation.\n' +
                '   Use world.elapsed or body.age for simulated time.'
            );
        }
        return originals.dateNow();
    };

    if (typeof performance !== 'undefined') {
        const performanceNow = performance.now.bind(performance);
        originals.performanceNow = performanceNow;
        performance.now = function(): number {
            if (isSimulating()) {
                warnOnce('performance.now',
                    '[determinism] performance.now() called during simulation.\n' +
                    '   Use world.elapsed for simulated time.'
                );
            }
            return performanceNow();
        };
    }

    console.log('[determinism] Guard enabled');
}

/**
 * Disable determinism guard and restore original functions.
 */
export function disableDeterminismGuard(): void {
    if (originalFunctions) {
        Math.random = originalFunctions.mathRandom;
        Date.now = originalFunctions.dateNow;
        if (originalFunctions.performanceNow && typeof performance !== 'undefined') {
            performance.now = originalFunctions.performanceNow;
        }
    }

    originalFunctions = null;
    installedWorld = null;
    warnedFunctions.clear();
}
