/**
 * ScriptThread: one run of a loaded program
 *
 * Owns the run's variables, progress and stop/pause flags. The engine keeps a
 * reference for queries and control; a thread detached after a stop timeout
 * keeps running to its next checkpoint but its outcome is ignored.
 */

import type { Program } from '../types/Instruction.type';
import type { Effect, PromptHandler } from '../types/Environment.type';
import type { ClockAdapter } from '../utils';
import { isDebugEnabled, debugLog } from '../utils';
import { VariableStore } from './VariableStore';
import { ExecutionControl } from './ExecutionControl';
import { ExecutionStateTracker } from './ExecutionStateTracker';
import { Executor, type RunOutcome } from './Executor';

export interface ThreadEnvironment {
    clock: ClockAdapter;
    prompt: PromptHandler;
    maxCallDepth: number;
    resolveEffect(name: string): Effect | undefined;
    log(message: string): void;
    print(message: string): void;
    onPaused(): void;
}

export class ScriptThread {
    public readonly id: number;
    public readonly variables: VariableStore = new VariableStore();
    public readonly control: ExecutionControl;
    public readonly tracker: ExecutionStateTracker;
    private executor: Executor;
    private completion: Promise<RunOutcome> | null = null;
    private detached = false;
    private prompt: PromptHandler;
    private promptWaiting = false;

    static debug: boolean = isDebugEnabled();

    constructor(id: number, program: Program, procedures: ReadonlyMap<string, Program>, environment: ThreadEnvironment) {
        this.id = id;
        this.prompt = environment.prompt;
        this.control = new ExecutionControl(() => environment.onPaused());
        this.tracker = new ExecutionStateTracker(program.length);
        this.executor = new Executor({
            program,
            procedures,
            variables: this.variables,
            control: this.control,
            tracker: this.tracker,
            clock: environment.clock,
            prompt: {
                request: (message) => this.requestConfirmation(message)
            },
            maxCallDepth: environment.maxCallDepth,
            resolveEffect: (name) => environment.resolveEffect(name),
            log: (message) => {
                if (!this.detached) {
                    environment.log(message);
                }
            },
            print: (message) => {
                if (!this.detached) {
                    environment.print(message);
                }
            }
        });
    }

    /**
     * Start the worker on the next microtask. Calling again returns the same run.
     */
    start(): Promise<RunOutcome> {
        if (!this.completion) {
            if (ScriptThread.debug) {
                debugLog('ScriptThread.start', `Starting thread ${this.id}`);
            }
            this.completion = Promise.resolve().then(() => this.executor.run());
        }
        return this.completion;
    }

    /**
     * Cancel this run's pending PROMPT. A prompt bridge shared with other
     * runs is left alone unless this run is the one waiting on it.
     */
    abortPrompt(reason: string): void {
        if (this.promptWaiting) {
            this.prompt.abort?.(reason);
        }
    }

    detach(): void {
        this.detached = true;
        this.control.requestStop();
    }

    get isDetached(): boolean {
        return this.detached;
    }

    private async requestConfirmation(message: string): Promise<boolean> {
        this.promptWaiting = true;
        try {
            return await this.prompt.request(message);
        } finally {
            this.promptWaiting = false;
        }
    }
}
