/**
 * Parser for FOR loop headers
 * Syntax: FOR $var = <start> TO <end> [STEP <step>]
 *
 * The header is packed into the marker's condition as `var|start|end|step`.
 */

import { isVariableName } from '../utils';
import { InvalidSyntaxError, ExecutionError } from '../classes/exceptions';
import { FlowControlKind, type FlowControlInstruction, type ForLoopDescriptor } from '../types/Instruction.type';

export const FOR_SYNTAX = 'FOR $variable = start TO end [STEP step]';

/**
 * Parse a FOR header from its tokens (tokens[0] is FOR)
 */
export function parseForLoop(tokens: readonly string[], line: number): FlowControlInstruction {
    const variable = tokens[1] ?? '';
    if (!isVariableName(variable)) {
        throw new InvalidSyntaxError(`FOR loop variable must start with $. Expected: ${FOR_SYNTAX}`, line);
    }
    if (tokens[2] !== '=') {
        throw new InvalidSyntaxError(`Invalid FOR syntax. Expected: ${FOR_SYNTAX}`, line);
    }

    const rest = tokens.slice(3);
    const toIndex = rest.findIndex((token) => token.toUpperCase() === 'TO');
    if (toIndex <= 0) {
        throw new InvalidSyntaxError(`Invalid FOR syntax, missing start or TO. Expected: ${FOR_SYNTAX}`, line);
    }
    const stepIndex = rest.findIndex((token, index) => index > toIndex && token.toUpperCase() === 'STEP');

    const start = rest.slice(0, toIndex).join(' ');
    const end = rest.slice(toIndex + 1, stepIndex < 0 ? undefined : stepIndex).join(' ');
    const step = stepIndex < 0 ? '1' : rest.slice(stepIndex + 1).join(' ');

    if (end.length === 0) {
        throw new InvalidSyntaxError(`Invalid FOR syntax, missing end value. Expected: ${FOR_SYNTAX}`, line);
    }
    if (step.length === 0) {
        throw new InvalidSyntaxError(`Invalid FOR syntax, missing step value. Expected: ${FOR_SYNTAX}`, line);
    }

    return {
        type: 'flowControl',
        kind: FlowControlKind.For,
        condition: packForLoop({ variable, start, end, step }),
        line
    };
}

export function packForLoop(descriptor: ForLoopDescriptor): string {
    return [descriptor.variable, descriptor.start, descriptor.end, descriptor.step].join('|');
}

export function unpackForLoop(condition: string, line: number | null = null): ForLoopDescriptor {
    const parts = condition.split('|');
    if (parts.length !== 4) {
        throw new ExecutionError(`Invalid FOR loop format: ${condition}`, line);
    }
    const [variable, start, end, step] = parts;
    return { variable, start, end, step };
}
