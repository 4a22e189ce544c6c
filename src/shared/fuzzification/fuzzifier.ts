import type { DomainPolicy, LinguisticVariable, MembershipDegrees } from '../types';
import { DomainError } from '../utils/errors';
import { interpolateMembership } from '../utils/fuzzy';
import { logWarning } from '../utils/logger';
import { universeBounds } from '../utils/universe';

/**
 * Membership degree of a crisp value in every term of `variable`.
 *
 * Out-of-universe values are rejected with a `DomainError` under the `reject`
 * policy; under `clamp` they are moved to the nearest bound and a warning is
 * recorded. Non-finite values are always rejected.
 */
export function fuzzify(
    variable: LinguisticVariable,
    value: number,
    policy: DomainPolicy,
    warnings: string[]
): MembershipDegrees {
    const { min, max } = universeBounds(variable.universe);

    if (!Number.isFinite(value)) {
        throw new DomainError(variable.name, value, min, max, `Input for variable "${variable.name}" must be a finite number, got ${value}.`);
    }

    let x = value;
    if (value < min || value > max) {
        if (policy === 'reject')
            throw new DomainError(variable.name, value, min, max);

        x = Math.min(max, Math.max(min, value));
        logWarning(`Input ${value} for variable "${variable.name}" lies outside [${min}, ${max}] and was clamped to ${x}.`, warnings);
    }

    const degrees: MembershipDegrees = {};
    variable.terms.forEach((term, label) => {
        degrees[label] = interpolateMembership(variable.universe, term.curve, x);
    });
    return degrees;
}
