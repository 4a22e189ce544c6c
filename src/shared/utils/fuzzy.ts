import type { MembershipFunction, Universe } from '../types';
import { ConfigError } from './errors';

function checkParameters(shape: string, params: number[]): void {
    if (params.some(p => !Number.isFinite(p))) {
        throw new ConfigError(`Invalid ${shape} parameters [${params.join(', ')}]: every parameter must be a finite number.`);
    }
    for (let i = 1; i < params.length; i++) {
        if (params[i] < params[i - 1]) {
            throw new ConfigError(`Invalid ${shape} parameters [${params.join(', ')}]: parameters must be non-decreasing.`);
        }
    }
}

export function triangular(a: number, b: number, c: number): MembershipFunction {
    checkParameters('triangular', [a, b, c]);
    const fn: MembershipFunction = { kind: 'triangular', a, b, c };
    return Object.freeze(fn);
}

export function trapezoidal(a: number, b: number, c: number, d: number): MembershipFunction {
    checkParameters('trapezoidal', [a, b, c, d]);
    const fn: MembershipFunction = { kind: 'trapezoidal', a, b, c, d };
    return Object.freeze(fn);
}

const clip = (degree: number): number => Math.min(1, Math.max(0, degree));

/**
 * Closed-form membership degree of `x`. Shoulders (a = b or c = d) are flat at 1,
 * so no slope is ever divided by a zero width.
 */
export function evaluateMembership(fn: MembershipFunction, x: number): number {
    switch (fn.kind) {
        case 'triangular': {
            const { a, b, c } = fn;
            if (x === b) return 1;
            if (x <= a || x >= c) return 0;
            if (x < b) {
                return clip((x - a) / (b - a));
            } else {
                return clip((c - x) / (c - b));
            }
        }
        case 'trapezoidal': {
            const { a, b, c, d } = fn;
            if (x >= b && x <= c) return 1;
            if (x <= a || x >= d) return 0;
            if (x < b) {
                return clip((x - a) / (b - a));
            } else {
                return clip((d - x) / (d - c));
            }
        }
    }
}

export function membershipCurve(universe: Universe, fn: MembershipFunction): number[] {
    return universe.map(x => evaluateMembership(fn, x));
}

/**
 * Degree of `value` on a sampled curve, linearly interpolated between the two
 * bracketing universe samples. Values beyond the universe take the boundary
 * sample's degree.
 */
export function interpolateMembership(universe: Universe, curve: readonly number[], value: number): number {
    if (curve.length !== universe.length) {
        throw new ConfigError(`Membership curve has ${curve.length} samples but the universe has ${universe.length}.`);
    }

    const last = universe.length - 1;
    if (value <= universe[0]) return curve[0];
    if (value >= universe[last]) return curve[last];

    // first index whose sample is >= value
    let lo = 0;
    let hi = last;
    while (lo < hi) {
        const mid = (lo + hi) >> 1;
        if (universe[mid] < value) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }

    if (universe[lo] === value) return curve[lo];

    const x0 = universe[lo - 1];
    const x1 = universe[lo];
    const t = (value - x0) / (x1 - x0);
    return curve[lo - 1] + t * (curve[lo] - curve[lo - 1]);
}
