/**
 * Records a warning on the caller-owned list that is returned with the result
 * and echoes it to the console.
 */
export function logWarning(message: string, warnings: string[]): void {
    warnings.push(message);
    console.warn(message);
}
