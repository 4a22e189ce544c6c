import type { Universe } from '../types';
import { ConfigError } from './errors';

// Guards the inclusive upper bound against float error in (max - min) / step.
const STEP_TOLERANCE = 1e-9;

export function universeFromPoints(points: readonly number[]): Universe {
    if (points.length === 0)
        throw new ConfigError('Universe must contain at least one point.');

    points.forEach((point, i) => {
        if (!Number.isFinite(point))
            throw new ConfigError(`Universe point ${i} is not a finite number (${point}).`);
        if (i > 0 && point <= points[i - 1])
            throw new ConfigError(`Universe points must be strictly increasing, but point ${i} (${point}) follows ${points[i - 1]}.`);
    });

    return Object.freeze([...points]);
}

/**
 * Evenly sampled universe from `min` to `max`. `max` is included when it lies a
 * whole number of steps from `min`, so `createUniverse(0, 10, 1)` has eleven samples.
 */
export function createUniverse(min: number, max: number, step: number): Universe {
    if (!Number.isFinite(min) || !Number.isFinite(max) || !Number.isFinite(step))
        throw new ConfigError(`Universe bounds and step must be finite numbers (min=${min}, max=${max}, step=${step}).`);
    if (step <= 0)
        throw new ConfigError(`Universe step must be positive, got ${step}.`);
    if (max < min)
        throw new ConfigError(`Universe max (${max}) is smaller than min (${min}).`);

    const count = Math.floor((max - min) / step + STEP_TOLERANCE) + 1;
    const points = Array.from({ length: count }, (_, i) => min + i * step);
    return universeFromPoints(points);
}

export function universeBounds(universe: Universe): { min: number; max: number } {
    return { min: universe[0], max: universe[universe.length - 1] };
}
