import type { Value } from '../utils/types';
import type { ClockAdapter } from '../utils/timing';
import type { CommandInstruction } from './Instruction.type';

// ============================================================================
// Execution state
// ============================================================================

export const ExecutionState = {
    Idle: 'Idle',
    Running: 'Running',
    Paused: 'Paused',
    Completed: 'Completed',
    Error: 'Error'
} as const;

export type ExecutionState = typeof ExecutionState[keyof typeof ExecutionState];

export type ExecutionCallback = (state: ExecutionState) => void;
export type LogCallback = (message: string) => void;
export type PrintCallback = (message: string) => void;

// ============================================================================
// Effects
// ============================================================================

export interface EffectResult {
    success: boolean;
    description: string;
    value?: Value; // Stored into the instruction's `storesInto` variable
}

/**
 * Operator confirmation used by PROMPT. `abort` rejects a pending request
 * when the run is stopped.
 */
export interface PromptHandler {
    request(message: string): Promise<boolean>;
    abort?(reason: string): void;
}

export interface EffectContext {
    instruction: CommandInstruction;
    args: readonly string[];
    evaluate(expression: string): Value;
    number(index: number): Value; // Operand `index` evaluated as an expression
    interpolate(text: string): string; // Quotes stripped, $variables substituted
    print(message: string): void;
    clock: ClockAdapter;
    prompt: PromptHandler;
}

export type Effect = (context: EffectContext) => Promise<EffectResult> | EffectResult;

// ============================================================================
// Commands and modules
// ============================================================================

/**
 * Operand rules for a command. Indexes count operands after the command keyword.
 */
export interface CommandDefinition {
    minArgs: number;
    maxArgs?: number; // Defaults to minArgs
    keywords?: Record<number, string>; // Fixed words, e.g. MOVE <device> TO <node> IN <graph>
    numeric?: number[]; // Operands that must be a number or an expression over $variables
    storesInto?: number; // Operand naming the $variable that receives the result
    message?: boolean; // Remaining tokens form one free-text operand
    validate?: (args: readonly string[]) => string | null; // Extra check, returns an error message
}

export interface CommandMetadata {
    syntax: string;
    description: string;
    example: string;
}

export interface ModuleMetadata {
    description: string;
    commands: string[];
}

export interface ModuleAdapter {
    name: string;
    commands: Record<string, CommandDefinition>;
    commandMetadata: Record<string, CommandMetadata>;
    moduleMetadata: ModuleMetadata;
    effects?: Record<string, Effect>;
}

export interface CommandHelp extends CommandMetadata {
    name: string;
    module: string | null;
}

// ============================================================================
// Engine options
// ============================================================================

export interface ScriptEngineOptions {
    stopTimeoutMs?: number; // How long stop() waits for the worker
    maxCallDepth?: number; // Nested CALL limit
    clock?: ClockAdapter;
    prompt?: PromptHandler;
    effects?: Record<string, Effect>;
    modules?: ModuleAdapter[];
    onStateChange?: ExecutionCallback;
    onLog?: LogCallback;
    onPrint?: PrintCallback;
}
