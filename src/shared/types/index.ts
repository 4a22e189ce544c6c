import { serializeExpression } from '../rules/ruleSerializer';
import { ConfigError } from '../utils/errors';

export type VariableRole = 'antecedent' | 'consequent';

export type DefuzzificationMethod = 'centroid' | 'bisector' | 'mom' | 'som' | 'lom';

export type DomainPolicy = 'reject' | 'clamp';

export type NoActivationPolicy = 'error' | 'midpoint';

export type MembershipShape = 'triangular' | 'trapezoidal';

/** Strictly increasing samples of a variable's range. */
export type Universe = readonly number[];

export type MembershipFunction =
    | { readonly kind: 'triangular'; readonly a: number; readonly b: number; readonly c: number }
    | { readonly kind: 'trapezoidal'; readonly a: number; readonly b: number; readonly c: number; readonly d: number };

export type Term = {
    readonly label: string;
    readonly membership: MembershipFunction;
    readonly curve: readonly number[];
};

export interface LinguisticVariable {
    readonly name: string;
    readonly role: VariableRole;
    readonly universe: Universe;
    readonly terms: ReadonlyMap<string, Term>;
    readonly defuzzification?: DefuzzificationMethod;
}

export type TermReference = {
    readonly variable: string;
    readonly term: string;
};

export type RuleExpression =
    | { readonly op: 'term'; readonly variable: string; readonly term: string }
    | { readonly op: 'and' | 'or'; readonly operands: readonly RuleExpression[] }
    | { readonly op: 'not'; readonly operand: RuleExpression };

export class Rule {
    readonly antecedent: RuleExpression;
    readonly consequent: TermReference;
    readonly weight: number;
    readonly label?: string;

    constructor(
        antecedent: RuleExpression,
        consequent: TermReference,
        weight: number = 1,
        label?: string
    ) {
        if (!Number.isFinite(weight) || weight <= 0 || weight > 1) {
            throw new ConfigError(`Invalid rule weight ${weight} for consequent "${consequent.variable} IS ${consequent.term}": weights must lie in (0, 1].`);
        }
        this.antecedent = antecedent;
        this.consequent = { variable: consequent.variable, term: consequent.term };
        this.weight = weight;
        if (label !== undefined)
            this.label = label;
        Object.freeze(this.consequent);
        Object.freeze(this);
    }

    toString(): string {
        const weightStr = this.weight === 1 ? '' : ` WITH ${this.weight}`;
        return `IF ${serializeExpression(this.antecedent)} THEN ${this.consequent.variable} IS ${this.consequent.term}${weightStr}`;
    }
}

export interface InferenceOptions {
    readonly domain_policy: DomainPolicy;
    readonly defuzzification: DefuzzificationMethod;
    readonly no_activation: NoActivationPolicy;
}

export interface InferenceConfiguration {
    readonly variables: ReadonlyMap<string, LinguisticVariable>;
    readonly antecedents: readonly LinguisticVariable[];
    readonly consequents: readonly LinguisticVariable[];
    readonly rules: readonly Rule[];
    readonly options: InferenceOptions;
}

export type UniverseSpec =
    | { min: number; max: number; step: number }
    | { points: number[] };

export interface TermSpec {
    label: string;
    shape: MembershipShape;
    params: number[];
}

export interface VariableSpec {
    name: string;
    role: VariableRole;
    universe: UniverseSpec;
    terms: TermSpec[];
    defuzzification?: DefuzzificationMethod;
}

export interface RuleSpec {
    rule: string;
    weight?: number;
    label?: string;
}

export interface Metadata {
    variables: VariableSpec[];
    rules: (string | RuleSpec)[];
    domain_policy?: DomainPolicy;
    defuzzification?: DefuzzificationMethod;
    no_activation?: NoActivationPolicy;
    split_char?: string;
    decimal_point?: '.' | ',';
}

export type CrispValues = { [variable: string]: number };

export type MembershipDegrees = { [term: string]: number };

export type RuleActivation = {
    index: number;
    label?: string;
    rule: string;
    consequent: TermReference;
    firing_strength: number;
    activation: number[];
};

export type InferenceResult = {
    outputs: CrispValues;
    fuzzified: { [variable: string]: MembershipDegrees };
    rules: RuleActivation[];
    aggregated: { [variable: string]: number[] };
    warnings: string[];
};

export type BatchRow = {
    row: number;
    inputs: CrispValues;
    outputs?: CrispValues;
    error?: string;
};

export type BatchResult = {
    results: BatchRow[];
    warnings: string[];
};
