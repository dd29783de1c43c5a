/**
 * Parser for block markers: IF, ELSE, ENDIF, FOR, ENDFOR, WHILE, ENDWHILE
 */

import { InvalidSyntaxError } from '../classes/exceptions';
import { FlowControlKind, type FlowControlInstruction } from '../types/Instruction.type';
import { parseForLoop } from './ForLoopParser';

/**
 * @param tokens - Line tokens, tokens[0] is the keyword
 * @param kind - Marker kind selected by the keyword
 */
export function parseFlowControl(tokens: readonly string[], kind: FlowControlKind, line: number): FlowControlInstruction {
    const keyword = tokens[0].toUpperCase();

    switch (kind) {
        case FlowControlKind.If:
        case FlowControlKind.While: {
            const condition = tokens.slice(1).join(' ');
            if (condition.length === 0) {
                const label = kind === FlowControlKind.If ? 'IF statement' : 'WHILE loop';
                throw new InvalidSyntaxError(`${label} requires a condition`, line);
            }
            return { type: 'flowControl', kind, condition, line };
        }

        case FlowControlKind.For:
            return parseForLoop(tokens, line);

        default:
            if (tokens.length > 1) {
                throw new InvalidSyntaxError(`${keyword} takes no operands`, line);
            }
            return { type: 'flowControl', kind, condition: '', line };
    }
}
