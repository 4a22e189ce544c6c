import type { Metadata } from '../../types';

export const tippingRules = [
    'IF quality IS low OR service IS low THEN tip IS low',
    'IF service IS medium THEN tip IS medium',
    'IF service IS high OR quality IS high THEN tip IS high',
];

export function tippingMetadata(overrides: Partial<Metadata> = {}): Metadata {
    return {
        variables: [
            {
                name: 'quality',
                role: 'antecedent',
                universe: { min: 0, max: 10, step: 1 },
                terms: [
                    { label: 'low', shape: 'triangular', params: [0, 0, 5] },
                    { label: 'medium', shape: 'triangular', params: [0, 5, 10] },
                    { label: 'high', shape: 'triangular', params: [5, 10, 10] },
                ],
            },
            {
                name: 'service',
                role: 'antecedent',
                universe: { min: 0, max: 10, step: 1 },
                terms: [
                    { label: 'low', shape: 'triangular', params: [0, 0, 5] },
                    { label: 'medium', shape: 'triangular', params: [0, 5, 10] },
                    { label: 'high', shape: 'triangular', params: [5, 10, 10] },
                ],
            },
            {
                name: 'tip',
                role: 'consequent',
                universe: { min: 0, max: 25, step: 1 },
                terms: [
                    { label: 'low', shape: 'triangular', params: [0, 0, 13] },
                    { label: 'medium', shape: 'triangular', params: [0, 13, 25] },
                    { label: 'high', shape: 'triangular', params: [13, 25, 25] },
                ],
            },
        ],
        rules: tippingRules,
        ...overrides,
    };
}
