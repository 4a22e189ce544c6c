import type { BatchRow, InferenceConfiguration } from '../types';
import type { InputRow } from '../dataProcessing/csvParser';
import { DomainError, NoActivationError } from '../utils/errors';
import { logWarning } from '../utils/logger';
import { simulate } from './inferencePipeline';

/**
 * Evaluates every input tuple independently against one configuration.
 * Rows rejected by the input domain or left without an active rule are
 * reported per row; any other error aborts the batch.
 */
export function executeBatchPipeline(
    configuration: InferenceConfiguration,
    rows: InputRow[],
    warnings: string[]
): BatchRow[] {
    return rows.map(({ row, values, error }) => {
        if (error !== undefined) {
            logWarning(`Row ${row} skipped: ${error}.`, warnings);
            return { row, inputs: values, error };
        }

        try {
            const result = simulate(configuration, values);
            result.warnings.forEach(warning => warnings.push(`Row ${row}: ${warning}`));
            return { row, inputs: values, outputs: result.outputs };
        } catch (e) {
            if (e instanceof DomainError || e instanceof NoActivationError) {
                logWarning(`Row ${row} failed: ${e.message}`, warnings);
                return { row, inputs: values, error: e.message };
            }
            throw e;
        }
    });
}
