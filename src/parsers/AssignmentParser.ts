/**
 * Parser for variable assignment
 * Syntax: SET $variable = <expression>
 */

import { isVariableName } from '../utils';
import { InvalidSyntaxError } from '../classes/exceptions';
import type { AssignmentInstruction } from '../types/Instruction.type';

export const SET_SYNTAX = 'SET $variable = expression';

export function parseAssignment(tokens: readonly string[], line: number): AssignmentInstruction {
    if (tokens.length < 4 || tokens[2] !== '=') {
        throw new InvalidSyntaxError(`Invalid variable assignment. Expected: ${SET_SYNTAX}`, line);
    }

    const variableName = tokens[1];
    if (!isVariableName(variableName)) {
        throw new InvalidSyntaxError(`Variable name must start with $: ${variableName}`, line);
    }

    return {
        type: 'assignment',
        variableName,
        expression: tokens.slice(3).join(' '),
        line
    };
}
