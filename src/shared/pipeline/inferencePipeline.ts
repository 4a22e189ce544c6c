import type { CrispValues, InferenceConfiguration, InferenceResult, LinguisticVariable } from '../types';
import { defuzzify } from '../defuzzification/defuzzifier';
import { fuzzify } from '../fuzzification/fuzzifier';
import { DomainError, NoActivationError } from '../utils/errors';
import { performInference } from '../utils/fuzzy_inference';
import type { FuzzifiedInputs } from '../utils/fuzzy_inference';
import { logWarning } from '../utils/logger';
import { universeBounds } from '../utils/universe';

function defuzzifyOutput(
    configuration: InferenceConfiguration,
    variable: LinguisticVariable,
    curve: number[],
    warnings: string[]
): number {
    const method = variable.defuzzification ?? configuration.options.defuzzification;
    try {
        return defuzzify(variable.universe, curve, method, variable.name);
    } catch (error) {
        if (error instanceof NoActivationError && configuration.options.no_activation === 'midpoint') {
            const { min, max } = universeBounds(variable.universe);
            const midpoint = (min + max) / 2;
            logWarning(`No rule fired for output variable "${variable.name}"; falling back to the universe midpoint ${midpoint}.`, warnings);
            return midpoint;
        }
        throw error;
    }
}

/**
 * Runs one full inference: fuzzify every input, evaluate the rule base,
 * aggregate per output variable and defuzzify. Returns the crisp outputs
 * together with every intermediate needed to display the computation.
 * Nothing is kept between calls.
 */
export function simulate(configuration: InferenceConfiguration, inputs: CrispValues): InferenceResult {
    const warnings: string[] = [];

    Object.keys(inputs)
        .filter(name => configuration.variables.get(name)?.role !== 'antecedent')
        .forEach(name => logWarning(`Input "${name}" does not name an input variable and was ignored.`, warnings));

    const fuzzified: FuzzifiedInputs = {};
    configuration.antecedents.forEach(variable => {
        const value = inputs[variable.name];
        if (value === undefined) {
            const { min, max } = universeBounds(variable.universe);
            throw new DomainError(variable.name, NaN, min, max, `No input value provided for variable "${variable.name}".`);
        }
        fuzzified[variable.name] = fuzzify(variable, value, configuration.options.domain_policy, warnings);
    });

    const { firingStrengths, activations, aggregated } = performInference(configuration, fuzzified);

    const outputs: CrispValues = {};
    configuration.consequents.forEach(variable => {
        outputs[variable.name] = defuzzifyOutput(configuration, variable, aggregated[variable.name], warnings);
    });

    const rules = configuration.rules.map((rule, index) => ({
        index,
        ...(rule.label !== undefined ? { label: rule.label } : {}),
        rule: rule.toString(),
        consequent: { variable: rule.consequent.variable, term: rule.consequent.term },
        firing_strength: firingStrengths[index],
        activation: activations[index],
    }));

    return { outputs, fuzzified, rules, aggregated, warnings };
}

export function compute(configuration: InferenceConfiguration, inputs: CrispValues): CrispValues {
    return simulate(configuration, inputs).outputs;
}
