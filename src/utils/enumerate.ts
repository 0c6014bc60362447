/**
 * Shared enumeration utilities.
 */

/**
 * Generate every total boolean assignment over the given variables.
 * Yields 2^n fresh maps, starting from all-false.
 */
export function* allAssignments(variables: string[]): Generator<Map<string, boolean>> {
    if (variables.length === 0) { yield new Map(); return; }
    const [first, ...rest] = variables;
    for (const value of [false, true]) {
        for (const m of allAssignments(rest)) {
            m.set(first, value);
            yield m;
        }
    }
}
