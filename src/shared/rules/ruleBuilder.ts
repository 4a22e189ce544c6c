import { Rule } from '../types';
import type { RuleExpression, TermReference } from '../types';
import { ConfigError } from '../utils/errors';

export function term(variable: string, label: string): RuleExpression {
    const expr: RuleExpression = { op: 'term', variable, term: label };
    return Object.freeze(expr);
}

function compound(op: 'and' | 'or', operands: RuleExpression[]): RuleExpression {
    if (operands.length === 0)
        throw new ConfigError(`${op.toUpperCase()} needs at least one operand.`);
    if (operands.length === 1)
        return operands[0];
    const expr: RuleExpression = { op, operands: Object.freeze([...operands]) };
    return Object.freeze(expr);
}

export function and(...operands: RuleExpression[]): RuleExpression {
    return compound('and', operands);
}

export function or(...operands: RuleExpression[]): RuleExpression {
    return compound('or', operands);
}

export function not(operand: RuleExpression): RuleExpression {
    const expr: RuleExpression = { op: 'not', operand };
    return Object.freeze(expr);
}

export function createRule(
    antecedent: RuleExpression,
    consequent: TermReference,
    options: { weight?: number; label?: string } = {}
): Rule {
    return new Rule(antecedent, consequent, options.weight ?? 1, options.label);
}
