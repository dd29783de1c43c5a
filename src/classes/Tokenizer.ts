/**
 * Tokenizer for script lines
 */

import { FlowControlKind } from '../types/Instruction.type';

/**
 * Flow control keywords and the marker kind each produces
 */
export const FLOW_CONTROL_KEYWORDS: ReadonlyMap<string, FlowControlKind> = new Map([
    ['IF', FlowControlKind.If],
    ['ELSE', FlowControlKind.Else],
    ['ENDIF', FlowControlKind.EndIf],
    ['FOR', FlowControlKind.For],
    ['ENDFOR', FlowControlKind.EndFor],
    ['WHILE', FlowControlKind.While],
    ['ENDWHILE', FlowControlKind.EndWhile]
]);

/**
 * Words that cannot be used as command names
 */
export const RESERVED_WORDS = new Set([
    ...FLOW_CONTROL_KEYWORDS.keys(),
    'SET', 'CALL', 'DEFINE', 'END'
]);

export class Tokenizer {
    /**
     * Split a line on spaces and tabs outside double quotes.
     * Quotes stay part of their token; an unterminated quote runs to the end of the line.
     */
    static tokenizeLine(line: string): string[] {
        const tokens: string[] = [];
        let current = '';
        let inQuotes = false;

        for (const char of line) {
            if (char === '"') {
                inQuotes = !inQuotes;
                current += char;
                continue;
            }

            if ((char === ' ' || char === '\t') && !inQuotes) {
                if (current.length > 0) {
                    tokens.push(current);
                    current = '';
                }
                continue;
            }

            current += char;
        }

        if (current.length > 0) {
            tokens.push(current);
        }

        return tokens;
    }
}
