/**
 * Time Step
 *
 * The simulation advances in fixed quanta of 1/60 s. Rates (speed, angular
 * speed) are per second; displacements are per step.
 */

export const FRAMES_PER_SECOND = 60;

/** Simulated seconds advanced by one `World2D.simulate()` call. */
export const TIME_STEP = 1 / FRAMES_PER_SECOND;

/** Per-second rate -> per-step displacement. */
export function rateToStep(rate: number): number {
    return rate * TIME_STEP;
}

/** Per-step displacement -> per-second rate. */
export function stepToRate(delta: number): number {
    return delta / TIME_STEP;
}

export function stepsToSeconds(steps: number): number {
    return steps * TIME_STEP;
}
