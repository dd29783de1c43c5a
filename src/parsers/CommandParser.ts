/**
 * Parser for registered commands
 *
 * Operand rules come from the command's CommandDefinition; every violation is
 * reported with the command's syntax line.
 */

import { containsVariableReference, isVariableName, type VariableLookup } from '../utils';
import { InvalidSyntaxError, InvalidExpressionError } from '../classes/exceptions';
import { ExpressionEvaluator } from '../classes/ExpressionEvaluator';
import type { CommandInstruction } from '../types/Instruction.type';
import type { CommandDefinition } from '../types/Environment.type';

const NO_VARIABLES: VariableLookup = { get: () => 0 };

/**
 * A numeric operand is any expression that references a $variable
 * (checked when it runs) or evaluates to a number now.
 */
export function isNumericOperand(text: string): boolean {
    if (containsVariableReference(text)) {
        return true;
    }
    try {
        new ExpressionEvaluator(NO_VARIABLES).evaluate(text);
        return true;
    } catch (error) {
        if (error instanceof InvalidExpressionError) {
            return false;
        }
        throw error;
    }
}

/**
 * Parse a command line
 *
 * @param name - Upper-cased command name
 * @param tokens - Line tokens, tokens[0] is the command as written
 * @param syntax - Syntax line used in error messages
 */
export function parseCommand(
    name: string,
    tokens: readonly string[],
    definition: CommandDefinition,
    line: number,
    syntax: string = name
): CommandInstruction {
    let args = tokens.slice(1);
    const expected = `Invalid ${name} syntax. Expected: ${syntax}`;

    if (definition.message) {
        if (args.length < definition.minArgs) {
            throw new InvalidSyntaxError(expected, line);
        }
        args = args.length > 0 ? [args.join(' ')] : [];
    }

    const maxArgs = definition.maxArgs ?? definition.minArgs;
    if (args.length < definition.minArgs || args.length > maxArgs) {
        throw new InvalidSyntaxError(expected, line);
    }

    for (const [position, keyword] of Object.entries(definition.keywords ?? {})) {
        const operand = args[Number(position)];
        if (operand === undefined || operand.toUpperCase() !== keyword) {
            throw new InvalidSyntaxError(`Expected '${keyword}' in ${name} command. Expected: ${syntax}`, line);
        }
    }

    for (const position of definition.numeric ?? []) {
        const operand = args[position];
        if (operand !== undefined && !isNumericOperand(operand)) {
            throw new InvalidSyntaxError(`${name} expects a number for operand ${position + 1}, got '${operand}'. Expected: ${syntax}`, line);
        }
    }

    let storesInto: string | undefined;
    if (definition.storesInto !== undefined) {
        storesInto = args[definition.storesInto];
        if (storesInto === undefined || !isVariableName(storesInto)) {
            throw new InvalidSyntaxError(`${name} stores its result in a $variable. Expected: ${syntax}`, line);
        }
    }

    const problem = definition.validate ? definition.validate(args) : null;
    if (problem) {
        throw new InvalidSyntaxError(`${problem}. Expected: ${syntax}`, line);
    }

    const instruction: CommandInstruction = {
        type: 'command',
        effectName: name,
        arguments: args,
        description: [name, ...args].join(' '),
        line
    };
    return storesInto === undefined ? instruction : { ...instruction, storesInto };
}
