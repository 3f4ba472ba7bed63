/**
 * Core Module
 */

export { FRAMES_PER_SECOND, TIME_STEP, rateToStep, stepToRate, stepsToSeconds } from './time-step';
