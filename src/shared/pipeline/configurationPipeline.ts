import type { InferenceConfiguration, InferenceOptions, LinguisticVariable, MembershipFunction, Metadata, Rule, TermSpec, Universe, UniverseSpec, VariableSpec } from '../types';
import { parseRuleString } from '../rules/ruleParser';
import { collectReferences, validateRules } from '../rules/ruleValidator';
import { ConfigError } from '../utils/errors';
import { trapezoidal, triangular } from '../utils/fuzzy';
import { logWarning } from '../utils/logger';
import { createUniverse, universeFromPoints } from '../utils/universe';
import { createVariable } from '../variables/linguisticVariable';

const DEFAULT_OPTIONS: InferenceOptions = {
    domain_policy: 'reject',
    defuzzification: 'centroid',
    no_activation: 'error',
};

function withContext<T>(context: string, build: () => T): T {
    try {
        return build();
    } catch (error) {
        if (error instanceof ConfigError)
            throw new ConfigError(error.issues.map(issue => `${context}: ${issue}`));
        throw error;
    }
}

/**
 * Assembles an immutable inference configuration from already built variables
 * and rules. Fails with a `ConfigError` on duplicate variable names or on any
 * rule reference that does not resolve; unused variables only produce warnings.
 */
export function createConfiguration(
    variables: LinguisticVariable[],
    rules: Rule[],
    options: Partial<InferenceOptions> = {},
    warnings: string[] = []
): InferenceConfiguration {
    const byName = new Map<string, LinguisticVariable>();
    const issues: string[] = [];
    variables.forEach(variable => {
        if (byName.has(variable.name))
            issues.push(`Duplicate variable name "${variable.name}".`);
        byName.set(variable.name, variable);
    });
    if (issues.length > 0)
        throw new ConfigError(issues);

    validateRules(rules, byName);

    const antecedents = variables.filter(v => v.role === 'antecedent');
    const consequents = variables.filter(v => v.role === 'consequent');
    if (consequents.length === 0)
        throw new ConfigError('Configuration has no output (consequent) variable.');

    const referenced = new Set(rules.flatMap(rule => collectReferences(rule.antecedent).map(ref => ref.variable)));
    antecedents
        .filter(v => !referenced.has(v.name))
        .forEach(v => logWarning(`Input variable "${v.name}" is not used by any rule.`, warnings));

    const targeted = new Set(rules.map(rule => rule.consequent.variable));
    consequents
        .filter(v => !targeted.has(v.name))
        .forEach(v => logWarning(`Output variable "${v.name}" is not the conclusion of any rule.`, warnings));

    const configuration: InferenceConfiguration = {
        variables: byName,
        antecedents: Object.freeze(antecedents),
        consequents: Object.freeze(consequents),
        rules: Object.freeze([...rules]),
        options: Object.freeze({
            domain_policy: options.domain_policy ?? DEFAULT_OPTIONS.domain_policy,
            defuzzification: options.defuzzification ?? DEFAULT_OPTIONS.defuzzification,
            no_activation: options.no_activation ?? DEFAULT_OPTIONS.no_activation,
        }),
    };
    return Object.freeze(configuration);
}

function buildUniverse(spec: UniverseSpec): Universe {
    if ('points' in spec)
        return universeFromPoints(spec.points);
    return createUniverse(spec.min, spec.max, spec.step);
}

function buildMembership(spec: TermSpec): MembershipFunction {
    const { shape, params } = spec;
    if (!Array.isArray(params))
        throw new ConfigError(`Term "${spec.label}" has no parameter list.`);

    switch (shape) {
        case 'triangular':
            if (params.length !== 3)
                throw new ConfigError(`Term "${spec.label}": triangular membership takes 3 parameters, got ${params.length}.`);
            return triangular(params[0], params[1], params[2]);
        case 'trapezoidal':
            if (params.length !== 4)
                throw new ConfigError(`Term "${spec.label}": trapezoidal membership takes 4 parameters, got ${params.length}.`);
            return trapezoidal(params[0], params[1], params[2], params[3]);
        default:
            throw new ConfigError(`Term "${spec.label}": unknown membership shape "${String(shape)}" (expected triangular or trapezoidal).`);
    }
}

function buildVariable(spec: VariableSpec): LinguisticVariable {
    return withContext(`Variable "${spec.name}"`, () => {
        if (spec.role !== 'antecedent' && spec.role !== 'consequent')
            throw new ConfigError(`unknown role "${String(spec.role)}" (expected antecedent or consequent).`);

        const universe = buildUniverse(spec.universe);
        return createVariable({
            name: spec.name,
            role: spec.role,
            universe,
            terms: spec.terms.map(term => ({ label: term.label, membership: buildMembership(term) })),
            defuzzification: spec.defuzzification,
        });
    });
}

/**
 * Builds a configuration from its declarative (JSON) description.
 * Every failure is a `ConfigError` naming the variable, term or rule concerned.
 */
export function buildConfiguration(metadata: Metadata): { configuration: InferenceConfiguration; warnings: string[] } {
    const warnings: string[] = [];

    if (!Array.isArray(metadata.variables) || metadata.variables.length === 0)
        throw new ConfigError('Metadata must declare at least one variable.');
    if (!Array.isArray(metadata.rules))
        throw new ConfigError('Metadata must declare a list of rules.');

    const variables = metadata.variables.map(buildVariable);

    const rules = metadata.rules.map((entry, index) => withContext(`Rule ${index + 1}`, () => {
        if (typeof entry === 'string')
            return parseRuleString(entry);
        return parseRuleString(entry.rule, entry.weight, entry.label);
    }));

    const configuration = createConfiguration(variables, rules, {
        domain_policy: metadata.domain_policy,
        defuzzification: metadata.defuzzification,
        no_activation: metadata.no_activation,
    }, warnings);

    return { configuration, warnings };
}
