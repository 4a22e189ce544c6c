import * as math from 'mathjs';
import type { DefuzzificationMethod, Universe } from '../types';
import { ConfigError, NoActivationError } from '../utils/errors';

/**
 * Reduces an aggregated output curve to one crisp value.
 *
 * - centroid: Σ x·μ(x) / Σ μ(x) over the universe samples
 * - bisector: first sample where the running sum of μ reaches half the total
 * - mom / som / lom: mean / smallest / largest sample where μ is maximal
 *
 * An all-zero curve has no defined result and raises `NoActivationError`.
 */
export function defuzzify(
    universe: Universe,
    curve: readonly number[],
    method: DefuzzificationMethod = 'centroid',
    variable: string = 'output'
): number {
    if (curve.length !== universe.length) {
        throw new ConfigError(`Aggregated curve for "${variable}" has ${curve.length} samples but its universe has ${universe.length}.`);
    }

    const samples = curve.slice();
    const total = math.sum(samples);
    if (total <= 0)
        throw new NoActivationError(variable);

    switch (method) {
        case 'centroid':
            return math.sum(universe.map((x, i) => x * samples[i])) / total;
        case 'bisector': {
            const half = total / 2;
            let running = 0;
            for (let i = 0; i < universe.length; i++) {
                running += samples[i];
                if (running >= half) return universe[i];
            }
            return universe[universe.length - 1];
        }
        case 'mom':
        case 'som':
        case 'lom': {
            const peak = math.max(samples);
            const atPeak = universe.filter((_, i) => samples[i] === peak);
            if (method === 'som') return atPeak[0];
            if (method === 'lom') return atPeak[atPeak.length - 1];
            return math.mean(atPeak);
        }
    }
}
