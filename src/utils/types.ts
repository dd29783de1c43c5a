/**
 * Shared types for utility functions
 */

/**
 * Every script value is a number (booleans are 0/1, PRINT text is never stored)
 */
export type Value = number;

/**
 * Read access to the variables of a run. Names include the leading `$`.
 */
export interface VariableLookup {
    get(name: string): Value;
}
