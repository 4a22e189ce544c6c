export class FuzzyInferenceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Raised while a configuration is being assembled: malformed membership
 * parameters, duplicate labels or variables, rules that reference unknown
 * variables or labels. `issues` holds one entry per offending item.
 */
export class ConfigError extends FuzzyInferenceError {
    readonly issues: string[];

    constructor(issues: string | string[]) {
        const list = Array.isArray(issues) ? issues : [issues];
        super(list.length === 1 ? list[0] : `Invalid configuration:\n - ${list.join('\n - ')}`);
        this.issues = list;
    }
}

export class DomainError extends FuzzyInferenceError {
    readonly variable: string;
    readonly value: number;
    readonly min: number;
    readonly max: number;

    constructor(variable: string, value: number, min: number, max: number, message?: string) {
        super(message ?? `Input ${value} for variable "${variable}" lies outside its universe [${min}, ${max}].`);
        this.variable = variable;
        this.value = value;
        this.min = min;
        this.max = max;
    }
}

export class NoActivationError extends FuzzyInferenceError {
    readonly variable: string;

    constructor(variable: string) {
        super(`No rule fired for output variable "${variable}": the aggregated membership curve is zero everywhere, so it cannot be defuzzified.`);
        this.variable = variable;
    }
}
