import { describe, it, expect } from 'vitest';
import { defuzzify } from '../defuzzification/defuzzifier';
import { ConfigError, NoActivationError } from '../utils/errors';
import { membershipCurve, trapezoidal, triangular } from '../utils/fuzzy';
import { createUniverse, universeFromPoints } from '../utils/universe';

const universe = createUniverse(0, 10, 1);

describe('defuzzify', () => {
    it('returns the apex for a symmetric triangle under every method', () => {
        const curve = membershipCurve(universe, triangular(2, 5, 8));
        expect(defuzzify(universe, curve)).toBeCloseTo(5, 12);
        expect(defuzzify(universe, curve, 'bisector')).toBe(5);
        expect(defuzzify(universe, curve, 'mom')).toBe(5);
        expect(defuzzify(universe, curve, 'som')).toBe(5);
        expect(defuzzify(universe, curve, 'lom')).toBe(5);
    });

    it('computes the discrete centroid', () => {
        expect(defuzzify(universeFromPoints([0, 1, 2]), [0, 1, 1])).toBe(1.5);
        expect(defuzzify(universeFromPoints([0, 1, 2, 3]), [0.5, 0, 0, 0.5], 'centroid')).toBe(1.5);
    });

    it('picks the smallest, mean and largest maximizer of a plateau', () => {
        const clipped = membershipCurve(universe, trapezoidal(1, 3, 6, 8)).map(degree => Math.min(0.5, degree));
        expect(clipped).toEqual([0, 0, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0, 0, 0]);
        expect(defuzzify(universe, clipped, 'som')).toBe(2);
        expect(defuzzify(universe, clipped, 'lom')).toBe(7);
        expect(defuzzify(universe, clipped, 'mom')).toBe(4.5);
    });

    it('splits the area in half for the bisector', () => {
        const curve = membershipCurve(universe, trapezoidal(1, 3, 6, 8));
        expect(defuzzify(universe, curve, 'bisector')).toBe(4);
    });

    it('refuses to defuzzify an all-zero curve', () => {
        const flat = new Array<number>(universe.length).fill(0);
        expect(() => defuzzify(universe, flat, 'centroid', 'tip')).toThrow(NoActivationError);
        expect(() => defuzzify(universe, flat, 'centroid', 'tip'))
            .toThrow('No rule fired for output variable "tip": the aggregated membership curve is zero everywhere, so it cannot be defuzzified.');
    });

    it('handles universes with a million samples', () => {
        const wide = createUniverse(0, 1000000, 1);
        const flat = new Array<number>(wide.length).fill(0.5);
        expect(wide).toHaveLength(1000001);
        expect(defuzzify(wide, flat)).toBeCloseTo(500000, 6);
        expect(defuzzify(wide, flat, 'bisector')).toBe(500000);
        expect(defuzzify(wide, flat, 'som')).toBe(0);
        expect(defuzzify(wide, flat, 'lom')).toBe(1000000);
        expect(defuzzify(wide, flat, 'mom')).toBeCloseTo(500000, 6);
    });

    it('rejects curves of the wrong length', () => {
        expect(() => defuzzify(universe, [1, 0.5])).toThrow(ConfigError);
    });
});
