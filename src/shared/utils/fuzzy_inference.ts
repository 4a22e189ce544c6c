import type { InferenceConfiguration, MembershipDegrees, RuleExpression } from '../types';
import { termCurve } from '../variables/linguisticVariable';
import { fuzzyAnd, fuzzyNot, fuzzyOr } from './operators';

export type FuzzifiedInputs = { [variable: string]: MembershipDegrees };

export function evaluateExpression(expr: RuleExpression, fuzzified: FuzzifiedInputs): number {
    switch (expr.op) {
        case 'term': {
            const degrees = Object.hasOwn(fuzzified, expr.variable) ? fuzzified[expr.variable] : undefined;
            const degree = degrees !== undefined && Object.hasOwn(degrees, expr.term) ? degrees[expr.term] : undefined;
            if (degree === undefined) {
                throw new Error(`No membership degree for "${expr.variable} IS ${expr.term}" in the fuzzified inputs.`);
            }
            return degree;
        }
        case 'not':
            return fuzzyNot(evaluateExpression(expr.operand, fuzzified));
        case 'and':
            return fuzzyAnd(...expr.operands.map(operand => evaluateExpression(operand, fuzzified)));
        case 'or':
            return fuzzyOr(...expr.operands.map(operand => evaluateExpression(operand, fuzzified)));
    }
}

/**
 * Mamdani inference over already fuzzified inputs: each rule's consequent curve
 * is clipped at its firing strength, and the clipped curves of every output
 * variable are merged by pointwise max.
 */
export function performInference(configuration: InferenceConfiguration, fuzzified: FuzzifiedInputs) {
    const firingStrengths: number[] = [];
    const activations: number[][] = [];
    const aggregated: { [variable: string]: number[] } = {};

    configuration.consequents.forEach(variable => {
        aggregated[variable.name] = new Array<number>(variable.universe.length).fill(0);
    });

    configuration.rules.forEach(rule => {
        const firingStrength = rule.weight * evaluateExpression(rule.antecedent, fuzzified);

        const consequent = configuration.variables.get(rule.consequent.variable);
        if (!consequent) {
            throw new Error(`Output variable "${rule.consequent.variable}" not found in the configuration.`);
        }

        const activation = termCurve(consequent, rule.consequent.term).map(degree => fuzzyAnd(firingStrength, degree));
        const profile = aggregated[consequent.name];
        activation.forEach((degree, i) => {
            profile[i] = fuzzyOr(profile[i], degree);
        });

        firingStrengths.push(firingStrength);
        activations.push(activation);
    });

    return { firingStrengths, activations, aggregated };
}
