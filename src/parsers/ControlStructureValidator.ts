/**
 * Structural validation of block markers
 *
 * Openers push onto a stack; ELSE needs an IF on top; closers need their
 * opener on top and pop. Reports the first mismatch only.
 */

import { UnmatchedControlStructureError } from '../classes/exceptions';
import { FlowControlKind, type Program } from '../types/Instruction.type';

interface OpenBlock {
    kind: FlowControlKind;
    line: number;
    hasElse: boolean;
}

const CLOSERS: Partial<Record<FlowControlKind, { opener: FlowControlKind; message: string }>> = {
    [FlowControlKind.EndIf]: { opener: FlowControlKind.If, message: 'ENDIF without matching IF' },
    [FlowControlKind.EndFor]: { opener: FlowControlKind.For, message: 'ENDFOR without matching FOR' },
    [FlowControlKind.EndWhile]: { opener: FlowControlKind.While, message: 'ENDWHILE without matching WHILE' }
};

const OPENER_LABELS: Partial<Record<FlowControlKind, string>> = {
    [FlowControlKind.If]: 'IF',
    [FlowControlKind.For]: 'FOR',
    [FlowControlKind.While]: 'WHILE'
};

export function validateControlStructures(program: Program): UnmatchedControlStructureError[] {
    const stack: OpenBlock[] = [];

    for (const instruction of program) {
        if (instruction.type !== 'flowControl') {
            continue;
        }
        const { kind, line } = instruction;

        if (OPENER_LABELS[kind]) {
            stack.push({ kind, line, hasElse: false });
            continue;
        }

        const top = stack.length > 0 ? stack[stack.length - 1] : null;

        if (kind === FlowControlKind.Else) {
            if (!top || top.kind !== FlowControlKind.If) {
                return [new UnmatchedControlStructureError('ELSE without matching IF', line)];
            }
            if (top.hasElse) {
                return [new UnmatchedControlStructureError('Duplicate ELSE in IF statement', line)];
            }
            top.hasElse = true;
            continue;
        }

        const closer = CLOSERS[kind];
        if (closer) {
            if (!top || top.kind !== closer.opener) {
                return [new UnmatchedControlStructureError(closer.message, line)];
            }
            stack.pop();
        }
    }

    if (stack.length > 0) {
        const unclosed = stack[stack.length - 1];
        return [new UnmatchedControlStructureError(`Unclosed ${OPENER_LABELS[unclosed.kind]} statement`, unclosed.line)];
    }
    return [];
}
