/**
 * Executor: walks a program with explicit frames
 *
 * The main program and every procedure body run in a `block` frame; each
 * active FOR or WHILE loop owns a frame over its body. One driver loop
 * dispatches the instruction at the top frame's program counter, so loop
 * nesting and procedure calls never recurse on the JavaScript stack, and a
 * stop or pause request is seen before every instruction and every loop pass.
 */

import { FlowControlKind } from '../types/Instruction.type';
import type {
    Program,
    CommandInstruction,
    AssignmentInstruction,
    ProcedureCallInstruction,
    FlowControlInstruction
} from '../types/Instruction.type';
import type { Effect, EffectContext, EffectResult, PromptHandler } from '../types/Environment.type';
import { formatNumber, stripQuotes, substituteVariables, isDebugEnabled, debugLog, type ClockAdapter } from '../utils';
import { ExpressionEvaluator } from './ExpressionEvaluator';
import { ConditionEvaluator } from './ConditionEvaluator';
import { findMatchingEnd, findElseOrEndIf } from './BlockMatcher';
import { describeInstruction } from './InstructionPrinter';
import { unpackForLoop } from '../parsers/ForLoopParser';
import { ExecutionError, ExecutionFailedError, InvalidExpressionError } from './exceptions';
import type { VariableStore } from './VariableStore';
import type { ExecutionControl } from './ExecutionControl';
import type { ExecutionStateTracker } from './ExecutionStateTracker';

interface FrameBase {
    program: Program;
    pc: number;
    end: number; // Index one past the frame's last instruction
}

interface BlockFrame extends FrameBase {
    kind: 'block';
    procedure: string | null; // null for the main program
}

interface ForFrame extends FrameBase {
    kind: 'for';
    bodyStart: number;
    variable: string;
    limit: number;
    step: number;
}

interface WhileFrame extends FrameBase {
    kind: 'while';
    bodyStart: number;
    condition: string;
}

type Frame = BlockFrame | ForFrame | WhileFrame;

export type RunOutcome =
    | { status: 'completed' }
    | { status: 'stopped' }
    | { status: 'error'; error: Error };

/**
 * Everything a run needs from its engine
 */
export interface ExecutorContext {
    program: Program;
    procedures: ReadonlyMap<string, Program>;
    variables: VariableStore;
    control: ExecutionControl;
    tracker: ExecutionStateTracker;
    clock: ClockAdapter;
    prompt: PromptHandler;
    maxCallDepth: number;
    resolveEffect(name: string): Effect | undefined;
    log(message: string): void;
    print(message: string): void;
}

export class Executor {
    private context: ExecutorContext;
    private frames: Frame[] = [];
    private expressions: ExpressionEvaluator;
    private conditions: ConditionEvaluator;

    /**
     * Debug mode flag - set to true to enable logging
     * Controlled by the VITE_DEBUG environment variable or set programmatically
     */
    static debug: boolean = isDebugEnabled();

    constructor(context: ExecutorContext) {
        this.context = context;
        this.expressions = new ExpressionEvaluator(context.variables);
        this.conditions = new ConditionEvaluator(context.variables);
    }

    /**
     * Run the program to completion, stop, or first error. Never rejects.
     */
    async run(): Promise<RunOutcome> {
        const { program, control } = this.context;
        this.frames = [{ kind: 'block', program, pc: 0, end: program.length, procedure: null }];

        try {
            while (this.frames.length > 0) {
                if (!(await control.checkpoint())) {
                    return { status: 'stopped' };
                }

                const frame = this.frames[this.frames.length - 1];
                if (frame.pc >= frame.end) {
                    this.finishPass(frame);
                    continue;
                }

                await this.dispatch(frame);
            }
        } catch (error) {
            if (control.isStopRequested) {
                // Failures raised while a stop is pending belong to the stop
                return { status: 'stopped' };
            }
            const failure = error instanceof Error ? error : new Error(String(error));
            if (Executor.debug) {
                debugLog('Executor.run', `Run failed: ${failure.message}`);
            }
            return { status: 'error', error: failure };
        }

        this.context.tracker.finish();
        return { status: 'completed' };
    }

    private async dispatch(frame: Frame): Promise<void> {
        const instruction = frame.program[frame.pc];
        const description = describeInstruction(instruction);
        this.context.tracker.enter(instruction, description, this.frames[0].pc);
        this.context.log(`Executing: ${description}`);

        if (Executor.debug) {
            debugLog('Executor.dispatch', `pc=${frame.pc} frame=${frame.kind} depth=${this.frames.length} ${description}`);
        }

        switch (instruction.type) {
            case 'command':
                await this.executeCommand(instruction);
                frame.pc++;
                break;
            case 'assignment':
                this.executeAssignment(instruction);
                frame.pc++;
                break;
            case 'procedureCall':
                this.enterProcedure(instruction, frame);
                break;
            case 'flowControl':
                this.executeFlowControl(instruction, frame);
                break;
        }

        this.context.tracker.complete();
    }

    private async executeCommand(instruction: CommandInstruction): Promise<void> {
        const effect = this.context.resolveEffect(instruction.effectName);
        if (!effect) {
            throw new ExecutionFailedError(
                `Operation failed: ${instruction.description} (no effect registered for ${instruction.effectName})`,
                instruction.description,
                instruction.line
            );
        }

        let result: EffectResult;
        try {
            result = await effect(this.createEffectContext(instruction));
        } catch (error) {
            if (error instanceof InvalidExpressionError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new ExecutionFailedError(`Operation failed: ${instruction.description} (${message})`, instruction.description, instruction.line);
        }

        if (!result.success) {
            throw new ExecutionFailedError(`Operation failed: ${instruction.description} (${result.description})`, instruction.description, instruction.line);
        }

        if (instruction.storesInto && result.value !== undefined) {
            this.setVariable(instruction.storesInto, result.value);
        }
    }

    private createEffectContext(instruction: CommandInstruction): EffectContext {
        const { variables, clock, prompt } = this.context;
        return {
            instruction,
            args: instruction.arguments,
            evaluate: (expression) => this.expressions.evaluate(expression),
            number: (index) => {
                const operand = instruction.arguments[index];
                if (operand === undefined) {
                    throw new InvalidExpressionError(`${instruction.effectName} has no operand ${index + 1}`, '', instruction.line);
                }
                return this.expressions.evaluate(operand);
            },
            interpolate: (text) => substituteVariables(stripQuotes(text), variables),
            print: (message) => this.context.print(message),
            clock,
            prompt
        };
    }

    private executeAssignment(instruction: AssignmentInstruction): void {
        const value = this.expressions.evaluate(instruction.expression);
        this.setVariable(instruction.variableName, value);
    }

    private setVariable(name: string, value: number): void {
        this.context.variables.set(name, value);
        this.context.log(`Set variable ${name} = ${formatNumber(value)}`);
    }

    private enterProcedure(instruction: ProcedureCallInstruction, frame: Frame): void {
        this.context.log(`Calling procedure: ${instruction.name}`);

        const body = this.context.procedures.get(instruction.name);
        if (!body) {
            throw new ExecutionError(`Procedure not defined: ${instruction.name}`, instruction.line);
        }

        const depth = this.frames.filter((candidate) => candidate.kind === 'block').length - 1;
        if (depth >= this.context.maxCallDepth) {
            throw new ExecutionError(
                `Maximum procedure call depth of ${this.context.maxCallDepth} exceeded calling ${instruction.name}`,
                instruction.line
            );
        }

        frame.pc++;
        this.frames.push({ kind: 'block', program: body, pc: 0, end: body.length, procedure: instruction.name });
    }

    private executeFlowControl(instruction: FlowControlInstruction, frame: Frame): void {
        switch (instruction.kind) {
            case FlowControlKind.If: {
                const result = this.conditions.evaluate(instruction.condition);
                this.context.log(`Evaluating IF condition: ${instruction.condition} = ${result ? 'TRUE' : 'FALSE'}`);
                frame.pc = result ? frame.pc + 1 : findElseOrEndIf(frame.program, frame.pc) + 1;
                break;
            }

            case FlowControlKind.Else:
                // Reached only by finishing the then-branch
                frame.pc = findMatchingEnd(frame.program, frame.pc) + 1;
                break;

            case FlowControlKind.For:
                this.enterForLoop(instruction, frame);
                break;

            case FlowControlKind.While:
                this.enterWhileLoop(instruction, frame);
                break;

            default:
                frame.pc++;
        }
    }

    private enterForLoop(instruction: FlowControlInstruction, frame: Frame): void {
        const loop = unpackForLoop(instruction.condition, instruction.line);
        const endIndex = findMatchingEnd(frame.program, frame.pc);
        const start = this.expressions.evaluate(loop.start);
        const limit = this.expressions.evaluate(loop.end);
        const step = this.expressions.evaluate(loop.step);

        if (step === 0) {
            throw new ExecutionError('FOR loop step cannot be zero', instruction.line);
        }

        this.context.variables.set(loop.variable, start);
        const bodyStart = frame.pc + 1;
        frame.pc = endIndex + 1;

        if (Executor.shouldContinue(start, limit, step)) {
            this.context.log(`FOR loop: ${loop.variable} = ${formatNumber(start)}`);
            this.frames.push({
                kind: 'for',
                program: frame.program,
                pc: bodyStart,
                bodyStart,
                end: endIndex,
                variable: loop.variable,
                limit,
                step
            });
        }
    }

    private enterWhileLoop(instruction: FlowControlInstruction, frame: Frame): void {
        const endIndex = findMatchingEnd(frame.program, frame.pc);
        const bodyStart = frame.pc + 1;
        frame.pc = endIndex + 1;

        if (this.checkWhile(instruction.condition)) {
            this.frames.push({
                kind: 'while',
                program: frame.program,
                pc: bodyStart,
                bodyStart,
                end: endIndex,
                condition: instruction.condition
            });
        }
    }

    /**
     * The top frame ran past its last instruction
     */
    private finishPass(frame: Frame): void {
        switch (frame.kind) {
            case 'for': {
                const next = this.context.variables.get(frame.variable) + frame.step;
                this.context.variables.set(frame.variable, next);
                if (Executor.shouldContinue(next, frame.limit, frame.step)) {
                    this.context.log(`FOR loop: ${frame.variable} = ${formatNumber(next)}`);
                    frame.pc = frame.bodyStart;
                } else {
                    this.frames.pop();
                }
                break;
            }

            case 'while':
                if (this.checkWhile(frame.condition)) {
                    frame.pc = frame.bodyStart;
                } else {
                    this.frames.pop();
                }
                break;

            case 'block':
                this.frames.pop();
                break;
        }
    }

    private checkWhile(condition: string): boolean {
        const result = this.conditions.evaluate(condition);
        this.context.log(result
            ? `WHILE condition: ${condition} = TRUE`
            : `WHILE condition: ${condition} = FALSE, exiting loop`);
        return result;
    }

    private static shouldContinue(value: number, limit: number, step: number): boolean {
        return (step > 0 && value <= limit) || (step < 0 && value >= limit);
    }
}
