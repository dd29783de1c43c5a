/**
 * Instruction Type Definitions
 *
 * A script compiles into a flat list of instructions that the interpreter
 * walks with a program counter. Block structure (IF/ELSE/ENDIF, FOR/ENDFOR,
 * WHILE/ENDWHILE) is carried by marker instructions, so nesting is implied by
 * marker order alone.
 */

import type { ParseError } from '../classes/exceptions';

// ============================================================================
// Flow control markers
// ============================================================================

export const FlowControlKind = {
    If: 'If',
    Else: 'Else',
    EndIf: 'EndIf',
    For: 'For',
    EndFor: 'EndFor',
    While: 'While',
    EndWhile: 'EndWhile'
} as const;

export type FlowControlKind = typeof FlowControlKind[keyof typeof FlowControlKind];

// ============================================================================
// Instructions
// ============================================================================

/**
 * Invocation of a registered command's effect
 */
export interface CommandInstruction {
    readonly type: 'command';
    readonly effectName: string; // Upper-cased command name
    readonly arguments: readonly string[]; // Raw operand text, command keyword excluded
    readonly description: string; // "<NAME> <operands...>"
    readonly line: number;
    readonly storesInto?: string; // $variable receiving the effect's value
}

/**
 * A block marker. `condition` holds the boolean expression for If/While,
 * the packed `var|start|end|step` descriptor for For, and '' otherwise.
 */
export interface FlowControlInstruction {
    readonly type: 'flowControl';
    readonly kind: FlowControlKind;
    readonly condition: string;
    readonly line: number;
}

export interface AssignmentInstruction {
    readonly type: 'assignment';
    readonly variableName: string; // Includes the leading $
    readonly expression: string;
    readonly line: number;
}

export interface ProcedureCallInstruction {
    readonly type: 'procedureCall';
    readonly name: string;
    readonly line: number;
}

export type Instruction =
    | CommandInstruction
    | FlowControlInstruction
    | AssignmentInstruction
    | ProcedureCallInstruction;

export type Program = readonly Instruction[];

// ============================================================================
// Parsing results
// ============================================================================

/**
 * A trimmed source line and its original 1-based line number
 */
export interface SourceLine {
    text: string;
    lineNumber: number;
}

/**
 * Procedure name -> raw, trimmed body lines
 */
export type ProcedureTable = ReadonlyMap<string, readonly string[]>;

/**
 * Unpacked FOR descriptor. Each bound is expression text.
 */
export interface ForLoopDescriptor {
    variable: string;
    start: string;
    end: string;
    step: string;
}

export interface ParseResult {
    program: Program | null; // null when structural validation failed
    procedures: ProcedureTable;
    procedurePrograms: ReadonlyMap<string, Program>;
    errors: ParseError[];
    processedScript: string;
}
