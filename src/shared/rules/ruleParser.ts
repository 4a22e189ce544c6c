import { Rule } from '../types';
import type { RuleExpression, TermReference } from '../types';
import { ConfigError } from '../utils/errors';
import { and, not, or, term } from './ruleBuilder';

type Token = { text: string; position: number };

const KEYWORDS = ['IF', 'THEN', 'IS', 'AND', 'OR', 'NOT', 'WITH'];
const IDENTIFIER = /^[A-Za-z0-9_]+$/;

function tokenize(ruleStr: string): Token[] {
    const tokens: Token[] = [];
    const pattern = /\(|\)|[A-Za-z0-9_.]+|\S/g;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(ruleStr)) !== null) {
        tokens.push({ text: match[0], position: match.index });
    }
    return tokens;
}

/**
 * Recursive-descent parser for
 * `IF <expr> THEN <variable> IS <term> [WITH <weight>]`, where AND binds
 * tighter than OR and `x IS NOT y` is shorthand for `NOT x IS y`.
 */
class RuleTextParser {
    private index = 0;

    constructor(private readonly ruleStr: string, private readonly tokens: Token[]) {}

    private fail(message: string): never {
        const token = this.tokens[this.index];
        const where = token ? `at position ${token.position} ("${token.text}")` : 'at end of rule';
        throw new ConfigError(`Invalid rule "${this.ruleStr}": ${message} ${where}.`);
    }

    private peekKeyword(keyword: string): boolean {
        const token = this.tokens[this.index];
        return token !== undefined && token.text.toUpperCase() === keyword;
    }

    private acceptKeyword(keyword: string): boolean {
        if (this.peekKeyword(keyword)) {
            this.index++;
            return true;
        }
        return false;
    }

    private expectKeyword(keyword: string): void {
        if (!this.acceptKeyword(keyword))
            this.fail(`expected ${keyword}`);
    }

    private expectIdentifier(what: string): string {
        const token = this.tokens[this.index];
        if (!token || !IDENTIFIER.test(token.text) || KEYWORDS.includes(token.text.toUpperCase()))
            this.fail(`expected ${what}`);
        this.index++;
        return token.text;
    }

    parse(): { antecedent: RuleExpression; consequent: TermReference; weight?: number } {
        this.expectKeyword('IF');
        const antecedent = this.parseOr();
        this.expectKeyword('THEN');
        const variable = this.expectIdentifier('an output variable name');
        this.expectKeyword('IS');
        const label = this.expectIdentifier('an output term label');

        let weight: number | undefined;
        if (this.acceptKeyword('WITH')) {
            const token = this.tokens[this.index];
            weight = token ? Number(token.text) : NaN;
            if (!token || !Number.isFinite(weight))
                this.fail('expected a numeric weight');
            this.index++;
        }

        if (this.index < this.tokens.length)
            this.fail('unexpected trailing input');

        return { antecedent, consequent: { variable, term: label }, weight };
    }

    private parseOr(): RuleExpression {
        const operands = [this.parseAnd()];
        while (this.acceptKeyword('OR'))
            operands.push(this.parseAnd());
        return operands.length === 1 ? operands[0] : or(...operands);
    }

    private parseAnd(): RuleExpression {
        const operands = [this.parseUnary()];
        while (this.acceptKeyword('AND'))
            operands.push(this.parseUnary());
        return operands.length === 1 ? operands[0] : and(...operands);
    }

    private parseUnary(): RuleExpression {
        if (this.acceptKeyword('NOT'))
            return not(this.parseUnary());

        const token = this.tokens[this.index];
        if (token?.text === '(') {
            this.index++;
            const inner = this.parseOr();
            if (this.tokens[this.index]?.text !== ')')
                this.fail('expected ")"');
            this.index++;
            return inner;
        }

        const variable = this.expectIdentifier('a variable name');
        this.expectKeyword('IS');
        const negated = this.acceptKeyword('NOT');
        const leaf = term(variable, this.expectIdentifier('a term label'));
        return negated ? not(leaf) : leaf;
    }
}

/**
 * Parses a textual rule such as
 * `IF quality IS low OR service IS low THEN tip IS low WITH 0.8`.
 * A weight may be given in the text or as an argument, not both.
 */
export function parseRuleString(ruleStr: string, weight?: number, label?: string): Rule {
    const parsed = new RuleTextParser(ruleStr, tokenize(ruleStr)).parse();

    if (parsed.weight !== undefined && weight !== undefined)
        throw new ConfigError(`Invalid rule "${ruleStr}": weight given both in the rule text and separately.`);

    return new Rule(parsed.antecedent, parsed.consequent, parsed.weight ?? weight ?? 1, label);
}
