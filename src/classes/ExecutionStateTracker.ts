/**
 * Tracks progress of a run through its main program
 */

import type { Instruction } from '../types/Instruction.type';

export interface ExecutionProgress {
    currentLine: number; // Source line of the instruction being executed, 0 before the first
    currentOperation: string;
    currentIndex: number; // Position in the main program
    totalInstructions: number;
    executedInstructions: number;
    progress: number; // currentIndex / totalInstructions, 1 when finished
}

export class ExecutionStateTracker {
    private totalInstructions: number;
    private currentLine = 0;
    private currentOperation = '';
    private currentIndex = 0;
    private executedInstructions = 0;

    constructor(totalInstructions: number) {
        this.totalInstructions = totalInstructions;
    }

    /**
     * Record the instruction about to execute
     *
     * @param mainIndex - Program counter of the main program's frame
     */
    enter(instruction: Instruction, description: string, mainIndex: number): void {
        this.currentLine = instruction.line;
        this.currentOperation = description;
        this.currentIndex = mainIndex;
    }

    complete(): void {
        this.executedInstructions++;
    }

    finish(): void {
        this.currentIndex = this.totalInstructions;
    }

    snapshot(): ExecutionProgress {
        return {
            currentLine: this.currentLine,
            currentOperation: this.currentOperation,
            currentIndex: this.currentIndex,
            totalInstructions: this.totalInstructions,
            executedInstructions: this.executedInstructions,
            progress: this.totalInstructions > 0 ? this.currentIndex / this.totalInstructions : 0
        };
    }
}
