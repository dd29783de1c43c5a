/**
 * Utility for formatting errors with code context
 */

import type { ParseError } from '../classes/exceptions';

export interface ErrorContext {
    lineNumber?: number; // 1-based
    column?: number; // 1-based
    code?: string; // Original source code
    message: string;
}

/**
 * Format an error message with code context
 *
 * @param context - Error context with position and code information
 * @returns Formatted error message with code snippet
 */
export function formatErrorWithContext(context: ErrorContext): string {
    const { lineNumber, column, code, message } = context;
    const line = lineNumber ?? -1;
    const col = column ?? -1;

    let errorMsg = message;

    if (line >= 0) {
        if (col >= 0) {
            errorMsg += `\n  at line ${line}, column ${col}`;
        } else {
            errorMsg += `\n  at line ${line}`;
        }
    }

    if (code && line >= 1) {
        const lines = code.split('\n');
        const lineIndex = line - 1;

        if (lineIndex < lines.length) {
            const errorLine = lines[lineIndex];
            errorMsg += `\n\n  ${errorLine}`;

            if (col >= 0) {
                const caretPos = Math.max(0, col - 1);
                const caret = ' '.repeat(Math.min(caretPos, errorLine.length)) + '^';
                errorMsg += `\n  ${caret}`;
            }

            // 2 lines before and after
            const contextLines: string[] = [];
            for (let i = Math.max(0, lineIndex - 2); i < Math.min(lines.length, lineIndex + 3); i++) {
                const lineNum = (i + 1).toString().padStart(3, ' ');
                const marker = i === lineIndex ? '>' : ' ';
                contextLines.push(`  ${marker}${lineNum} | ${lines[i]}`);
            }

            errorMsg += '\n\nContext:\n' + contextLines.join('\n');
        }
    }

    return errorMsg;
}

/**
 * Format every parse error of a script, each with its source line and caret
 * under the first non-blank character.
 */
export function formatParseErrors(errors: readonly ParseError[], code: string): string {
    const lines = code.split('\n');
    return errors
        .map((error) => {
            const source = lines[error.lineNumber - 1] ?? '';
            const indent = source.length - source.trimStart().length;
            return formatErrorWithContext({
                lineNumber: error.lineNumber,
                column: indent + 1,
                code,
                message: error.message
            });
        })
        .join('\n\n');
}
