// Zadeh operators used for rule antecedents and Mamdani implication/aggregation.

export function fuzzyAnd(...degrees: number[]): number {
    return Math.min(...degrees);
}

export function fuzzyOr(...degrees: number[]): number {
    return Math.max(...degrees);
}

export function fuzzyNot(degree: number): number {
    return 1 - degree;
}
