import type { LinguisticVariable, Rule, RuleExpression, TermReference } from '../types';
import { ConfigError } from '../utils/errors';

export function collectReferences(expr: RuleExpression): TermReference[] {
    switch (expr.op) {
        case 'term':
            return [{ variable: expr.variable, term: expr.term }];
        case 'not':
            return collectReferences(expr.operand);
        case 'and':
        case 'or':
            return expr.operands.flatMap(collectReferences);
    }
}

function checkReference(
    reference: TermReference,
    role: LinguisticVariable['role'],
    variables: ReadonlyMap<string, LinguisticVariable>
): string | null {
    const variable = variables.get(reference.variable);
    if (!variable)
        return `unknown variable "${reference.variable}"`;
    if (variable.role !== role)
        return `variable "${reference.variable}" is ${variable.role === 'antecedent' ? 'an input' : 'an output'} and cannot be used as ${role === 'antecedent' ? 'a condition' : 'a conclusion'}`;
    if (!variable.terms.has(reference.term))
        return `variable "${reference.variable}" has no term "${reference.term}" (known: ${[...variable.terms.keys()].join(', ')})`;
    return null;
}

/**
 * Checks every (variable, term) pair the rule base mentions and throws one
 * `ConfigError` listing all offending references.
 */
export function validateRules(rules: readonly Rule[], variables: ReadonlyMap<string, LinguisticVariable>): void {
    const issues: string[] = [];

    rules.forEach((rule, index) => {
        const context = `Rule ${index + 1} "${rule.toString()}"`;

        collectReferences(rule.antecedent).forEach(reference => {
            const problem = checkReference(reference, 'antecedent', variables);
            if (problem)
                issues.push(`${context}: ${problem}`);
        });

        const problem = checkReference(rule.consequent, 'consequent', variables);
        if (problem)
            issues.push(`${context}: ${problem}`);
    });

    if (issues.length > 0)
        throw new ConfigError(issues);
}
