import type { RuleExpression } from '../types';

const isCompound = (expr: RuleExpression): boolean => expr.op === 'and' || expr.op === 'or';

/**
 * Text form of an antecedent tree, e.g. `(quality IS low OR service IS low) AND NOT price IS high`.
 * Compound operands are parenthesized so the text parses back into the same tree.
 */
export function serializeExpression(expr: RuleExpression): string {
    const wrap = (operand: RuleExpression) => isCompound(operand) ? `(${serializeExpression(operand)})` : serializeExpression(operand);

    switch (expr.op) {
        case 'term':
            return `${expr.variable} IS ${expr.term}`;
        case 'not':
            return `NOT ${wrap(expr.operand)}`;
        case 'and':
        case 'or':
            return expr.operands.map(wrap).join(` ${expr.op.toUpperCase()} `);
    }
}
