import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { main } from '../index';
import { parseInputTable } from '../dataProcessing/csvParser';
import { buildConfiguration } from '../pipeline/configurationPipeline';
import { executeBatchPipeline } from '../pipeline/batchPipeline';
import { tippingMetadata } from './fixtures/tipping';

beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
    vi.restoreAllMocks();
});

describe('parseInputTable', () => {
    it('reads one numeric tuple per line', () => {
        expect(parseInputTable('quality,service\n5,5\n0, 10\n', tippingMetadata())).toEqual([
            { row: 2, values: { quality: 5, service: 5 } },
            { row: 3, values: { quality: 0, service: 10 } },
        ]);
    });

    it('numbers rows by their line in the table, blank lines included', () => {
        const rows = parseInputTable('quality,service\n5,5\n\n0, 10\n\n\nabc,1\n', tippingMetadata());
        expect(rows.map(r => r.row)).toEqual([2, 4, 7]);
        expect(rows[2].error).toBe('Non-numeric value in column(s) quality');
    });

    it('keeps line numbers with a decimal comma', () => {
        const metadata = tippingMetadata({ split_char: ';', decimal_point: ',' });
        expect(parseInputTable('quality;service\n\n2,5;7\n', metadata)).toEqual([
            { row: 3, values: { quality: 2.5, service: 7 } },
        ]);
    });

    it('marks rows with non-numeric cells', () => {
        expect(parseInputTable('quality,service\nabc,1\n', tippingMetadata())).toEqual([
            { row: 2, values: { service: 1 }, error: 'Non-numeric value in column(s) quality' },
        ]);
    });

    it('honours the separator and decimal comma', () => {
        const metadata = tippingMetadata({ split_char: ';', decimal_point: ',' });
        expect(parseInputTable('quality;service\n2,5;7\n', metadata)).toEqual([
            { row: 2, values: { quality: 2.5, service: 7 } },
        ]);
    });

    it('refuses a decimal comma that is also the separator', () => {
        expect(() => parseInputTable('quality,service\n1,2\n', tippingMetadata({ decimal_point: ',' }))).toThrow(
            "Decimal point character is set to ',' but ',' is also the column separator - please set split_char"
        );
    });
});

describe('main', () => {
    it('evaluates every row independently', () => {
        const { results, warnings } = main(tippingMetadata(), 'quality,service\n5,5\n12,5\nabc,1\n');

        expect(results).toHaveLength(3);
        expect(results[0].row).toBe(2);
        expect(results[0].outputs?.tip).toBeCloseTo(38 / 3, 10);
        expect(results[1]).toEqual({
            row: 3,
            inputs: { quality: 12, service: 5 },
            error: 'Input 12 for variable "quality" lies outside its universe [0, 10].',
        });
        expect(results[2]).toEqual({
            row: 4,
            inputs: { service: 1 },
            error: 'Non-numeric value in column(s) quality',
        });
        expect(warnings).toEqual([
            'Row 3 failed: Input 12 for variable "quality" lies outside its universe [0, 10].',
            'Row 4 skipped: Non-numeric value in column(s) quality.',
        ]);
    });

    it('reports failures against the line they occur on', () => {
        const { results, warnings } = main(tippingMetadata(), 'quality,service\n5,5\n\n12,5\n');
        expect(results.map(r => r.row)).toEqual([2, 4]);
        expect(warnings).toEqual(['Row 4 failed: Input 12 for variable "quality" lies outside its universe [0, 10].']);
    });

    it('collects per-row warnings under the clamp policy', () => {
        const { results, warnings } = main(tippingMetadata({ domain_policy: 'clamp' }), 'quality,service\n12,5\n');
        expect(results[0].error).toBeUndefined();
        expect(warnings).toEqual(['Row 2: Input 12 for variable "quality" lies outside [0, 10] and was clamped to 10.']);
    });

    it('rejects a table without data rows', () => {
        expect(() => main(tippingMetadata(), 'quality,service\n')).toThrow('Input table has no data rows');
    });
});

describe('executeBatchPipeline', () => {
    it('reports rows where no rule fires', () => {
        const { configuration } = buildConfiguration(tippingMetadata({ rules: ['IF quality IS high THEN tip IS high', 'IF service IS high THEN tip IS high'] }));
        const warnings: string[] = [];
        const results = executeBatchPipeline(configuration, [
            { row: 2, values: { quality: 0, service: 0 } },
            { row: 3, values: { quality: 10, service: 10 } },
        ], warnings);

        expect(results[0].error).toBe('No rule fired for output variable "tip": the aggregated membership curve is zero everywhere, so it cannot be defuzzified.');
        expect(results[1].outputs?.tip).toBeGreaterThan(13);
        expect(warnings).toHaveLength(1);
    });
});
