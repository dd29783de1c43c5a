/**
 * Print instructions back as script text
 */

import { FlowControlKind, type Instruction, type FlowControlInstruction } from '../types/Instruction.type';
import { unpackForLoop } from '../parsers/ForLoopParser';

function printFlowControl(instruction: FlowControlInstruction): string {
    switch (instruction.kind) {
        case FlowControlKind.If:
            return `IF ${instruction.condition}`;
        case FlowControlKind.Else:
            return 'ELSE';
        case FlowControlKind.EndIf:
            return 'ENDIF';
        case FlowControlKind.For: {
            const loop = unpackForLoop(instruction.condition, instruction.line);
            return `FOR ${loop.variable} = ${loop.start} TO ${loop.end} STEP ${loop.step}`;
        }
        case FlowControlKind.EndFor:
            return 'ENDFOR';
        case FlowControlKind.While:
            return `WHILE ${instruction.condition}`;
        case FlowControlKind.EndWhile:
            return 'ENDWHILE';
    }
}

/**
 * One-line description of an instruction: its keyword followed by its operands
 */
export function describeInstruction(instruction: Instruction): string {
    switch (instruction.type) {
        case 'command':
            return instruction.description;
        case 'assignment':
            return `SET ${instruction.variableName} = ${instruction.expression}`;
        case 'procedureCall':
            return `CALL ${instruction.name}()`;
        case 'flowControl':
            return printFlowControl(instruction);
    }
}
