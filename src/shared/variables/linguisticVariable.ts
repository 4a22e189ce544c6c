import type { DefuzzificationMethod, LinguisticVariable, MembershipFunction, Term, Universe, VariableRole } from '../types';
import { ConfigError } from '../utils/errors';
import { membershipCurve } from '../utils/fuzzy';

const IDENTIFIER = /^[A-Za-z0-9_]+$/;

// Names and labels key plain objects in the inference results.
const RESERVED = new Set(['__proto__', 'constructor', 'prototype']);

export function createVariable(spec: {
    name: string;
    role: VariableRole;
    universe: Universe;
    terms: { label: string; membership: MembershipFunction }[];
    defuzzification?: DefuzzificationMethod;
}): LinguisticVariable {
    const { name, role, universe } = spec;

    if (!IDENTIFIER.test(name))
        throw new ConfigError(`Invalid variable name "${name}": names may only contain letters, digits and underscores.`);
    if (RESERVED.has(name))
        throw new ConfigError(`Invalid variable name "${name}": the name is reserved.`);
    if (spec.terms.length === 0)
        throw new ConfigError(`Variable "${name}" has no terms.`);
    if (spec.defuzzification !== undefined && role !== 'consequent')
        throw new ConfigError(`Variable "${name}" is an antecedent; only consequents take a defuzzification method.`);

    const terms = new Map<string, Term>();
    spec.terms.forEach(({ label, membership }) => {
        if (!IDENTIFIER.test(label))
            throw new ConfigError(`Invalid label "${label}" in variable "${name}": labels may only contain letters, digits and underscores.`);
        if (RESERVED.has(label))
            throw new ConfigError(`Invalid label "${label}" in variable "${name}": the label is reserved.`);
        if (terms.has(label))
            throw new ConfigError(`Duplicate label "${label}" in variable "${name}".`);

        terms.set(label, Object.freeze({
            label,
            membership,
            curve: Object.freeze(membershipCurve(universe, membership)),
        }));
    });

    const variable: LinguisticVariable = {
        name,
        role,
        universe,
        terms,
        ...(spec.defuzzification !== undefined ? { defuzzification: spec.defuzzification } : {}),
    };
    return Object.freeze(variable);
}

export function termCurve(variable: LinguisticVariable, label: string): readonly number[] {
    const term = variable.terms.get(label);
    if (!term)
        throw new ConfigError(`Variable "${variable.name}" has no term "${label}".`);
    return term.curve;
}
