/**
 * Parser for procedure calls
 * Syntax: CALL name()
 */

import { InvalidSyntaxError, ProcedureDefinitionError } from '../classes/exceptions';
import type { ProcedureCallInstruction, ProcedureTable } from '../types/Instruction.type';

export const CALL_SYNTAX = 'CALL procedureName()';

export function parseProcedureCall(tokens: readonly string[], line: number, procedures: ProcedureTable): ProcedureCallInstruction {
    if (tokens.length < 2) {
        throw new InvalidSyntaxError(`Invalid procedure call. Expected: ${CALL_SYNTAX}`, line);
    }

    const target = tokens.slice(1).join('');
    const paren = target.indexOf('(');
    const name = paren >= 0 ? target.slice(0, paren) : target;
    if (name.length === 0) {
        throw new InvalidSyntaxError(`Invalid procedure call. Expected: ${CALL_SYNTAX}`, line);
    }

    if (!procedures.has(name)) {
        throw new ProcedureDefinitionError(`Procedure not defined: ${name}`, line);
    }

    return { type: 'procedureCall', name, line };
}
