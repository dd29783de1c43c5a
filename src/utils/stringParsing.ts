/**
 * String parsing utilities for script text
 */

import type { Value, VariableLookup } from './types';

const VARIABLE_REFERENCE = /\$[A-Za-z_][A-Za-z0-9_]*/g;
const VARIABLE_NAME = /^\$[A-Za-z_][A-Za-z0-9_]*$/;
const NUMERIC_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Split a script into physical lines. A trailing `\r` stays on the line and is
 * removed by trimLine.
 */
export function splitIntoLines(script: string): string[] {
    return script.split('\n');
}

export function trimLine(line: string): string {
    return line.replace(/^[ \t\r\n]+|[ \t\r\n]+$/g, '');
}

/**
 * Blank lines and full-line `#` comments produce no instruction
 */
export function isSkippableLine(line: string): boolean {
    return line.length === 0 || line.startsWith('#');
}

export function isVariableName(token: string): boolean {
    return VARIABLE_NAME.test(token);
}

export function containsVariableReference(text: string): boolean {
    return text.search(VARIABLE_REFERENCE) >= 0;
}

export function isNumericLiteral(text: string): boolean {
    return NUMERIC_LITERAL.test(text);
}

/**
 * Render a number the way it is substituted into expressions and messages
 */
export function formatNumber(value: Value): string {
    return String(value);
}

/**
 * Replace every `$name` with the current value of that variable (unknown names read as 0)
 */
export function substituteVariables(text: string, variables: VariableLookup): string {
    return text.replace(VARIABLE_REFERENCE, (name) => formatNumber(variables.get(name)));
}

/**
 * Remove one pair of surrounding double quotes, if present
 */
export function stripQuotes(text: string): string {
    if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
        return text.slice(1, -1);
    }
    return text;
}
