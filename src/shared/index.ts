import type { BatchResult, Metadata } from './types';
import { parseInputTable } from './dataProcessing/csvParser';
import { buildConfiguration } from './pipeline/configurationPipeline';
import { executeBatchPipeline } from './pipeline/batchPipeline';

export * from './types';
export { ConfigError, DomainError, FuzzyInferenceError, NoActivationError } from './utils/errors';
export { createUniverse, universeBounds, universeFromPoints } from './utils/universe';
export { evaluateMembership, interpolateMembership, membershipCurve, trapezoidal, triangular } from './utils/fuzzy';
export { fuzzyAnd, fuzzyNot, fuzzyOr } from './utils/operators';
export { createVariable } from './variables/linguisticVariable';
export { fuzzify } from './fuzzification/fuzzifier';
export { and, createRule, not, or, term } from './rules/ruleBuilder';
export { parseRuleString } from './rules/ruleParser';
export { serializeExpression } from './rules/ruleSerializer';
export { defuzzify } from './defuzzification/defuzzifier';
export { buildConfiguration, createConfiguration } from './pipeline/configurationPipeline';
export { compute, simulate } from './pipeline/inferencePipeline';
export { parseInputTable } from './dataProcessing/csvParser';
export { executeBatchPipeline } from './pipeline/batchPipeline';

/**
 * Builds the configuration described by `metadata` and evaluates every input
 * tuple of the CSV table `data` against it.
 */
export function main(metadata: Metadata, data: string): BatchResult {
    const { configuration, warnings } = buildConfiguration(metadata);
    const rows = parseInputTable(data, metadata);

    if (rows.length === 0)
        throw new Error("Input table has no data rows");

    const results = executeBatchPipeline(configuration, rows, warnings);
    return { results, warnings };
}
