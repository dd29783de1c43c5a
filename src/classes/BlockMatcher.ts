/**
 * Block matching over flat programs. Results are never cached.
 */

import { FlowControlKind, type Program, type Instruction } from '../types/Instruction.type';
import { UnmatchedControlStructureError } from './exceptions';

interface BlockPair {
    open: FlowControlKind;
    close: FlowControlKind;
    label: string;
}

const IF_BLOCK: BlockPair = { open: FlowControlKind.If, close: FlowControlKind.EndIf, label: 'ENDIF' };
const FOR_BLOCK: BlockPair = { open: FlowControlKind.For, close: FlowControlKind.EndFor, label: 'ENDFOR' };
const WHILE_BLOCK: BlockPair = { open: FlowControlKind.While, close: FlowControlKind.EndWhile, label: 'ENDWHILE' };

function isMarker(instruction: Instruction, kind: FlowControlKind): boolean {
    return instruction.type === 'flowControl' && instruction.kind === kind;
}

/**
 * Index of the closer matching the If, Else, For or While at `openerIndex`.
 * An Else closes with its enclosing If's EndIf.
 */
export function findMatchingEnd(program: Program, openerIndex: number): number {
    const opener = program[openerIndex];
    if (!opener || opener.type !== 'flowControl') {
        throw new UnmatchedControlStructureError(`No block opener at instruction ${openerIndex}`, opener ? opener.line : 0);
    }

    let pair: BlockPair;
    switch (opener.kind) {
        case FlowControlKind.If:
        case FlowControlKind.Else:
            pair = IF_BLOCK;
            break;
        case FlowControlKind.For:
            pair = FOR_BLOCK;
            break;
        case FlowControlKind.While:
            pair = WHILE_BLOCK;
            break;
        default:
            throw new UnmatchedControlStructureError(`${opener.kind} does not open a block`, opener.line);
    }

    let depth = 1;
    for (let i = openerIndex + 1; i < program.length; i++) {
        const instruction = program[i];
        if (isMarker(instruction, pair.open)) {
            depth++;
        } else if (isMarker(instruction, pair.close)) {
            depth--;
            if (depth === 0) {
                return i;
            }
        }
    }

    throw new UnmatchedControlStructureError(`Failed to find matching ${pair.label}`, opener.line);
}

/**
 * Index of the nearest same-depth Else or EndIf after the If at `ifIndex`
 */
export function findElseOrEndIf(program: Program, ifIndex: number): number {
    let depth = 0;
    for (let i = ifIndex + 1; i < program.length; i++) {
        const instruction = program[i];
        if (isMarker(instruction, FlowControlKind.If)) {
            depth++;
        } else if (isMarker(instruction, FlowControlKind.Else) && depth === 0) {
            return i;
        } else if (isMarker(instruction, FlowControlKind.EndIf)) {
            if (depth === 0) {
                return i;
            }
            depth--;
        }
    }

    const opener = program[ifIndex];
    throw new UnmatchedControlStructureError('Failed to find matching ELSE or ENDIF', opener ? opener.line : 0);
}
