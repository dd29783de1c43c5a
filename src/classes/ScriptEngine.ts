/**
 * ScriptEngine: parses, loads and runs scripts on a cooperative worker
 *
 * The controlling caller uses start/pause/resume/stop; the worker reports
 * state changes and log lines through callbacks. Every run gets a fresh
 * ScriptThread, so variables and progress never leak between runs.
 */

import { ScriptParser } from './ScriptParser';
import { CommandRegistry } from './CommandRegistry';
import { ScriptThread } from './ScriptThread';
import { UserPrompt } from './UserPrompt';
import { TimeoutError, type ParseError } from './exceptions';
import type { RunOutcome } from './Executor';
import type { ExecutionProgress } from './ExecutionStateTracker';
import { ExecutionState } from '../types/Environment.type';
import type {
    CommandDefinition,
    CommandHelp,
    CommandMetadata,
    Effect,
    ExecutionCallback,
    LogCallback,
    ModuleAdapter,
    PrintCallback,
    PromptHandler,
    ScriptEngineOptions
} from '../types/Environment.type';
import type { Program, ParseResult, ProcedureTable } from '../types/Instruction.type';
import { systemClock, withTimeout, isDebugEnabled, debugLog, type ClockAdapter, type Value } from '../utils';

export const DEFAULT_ENGINE_OPTIONS = {
    stopTimeoutMs: 5000,
    maxCallDepth: 32
} as const;

interface LoadedScript {
    program: Program;
    procedures: ProcedureTable;
    procedurePrograms: ReadonlyMap<string, Program>;
    processedScript: string;
}

export class ScriptEngine {
    private registry: CommandRegistry;
    private parser: ScriptParser;
    private clock: ClockAdapter;
    private prompt: PromptHandler;
    private stopTimeoutMs: number;
    private maxCallDepth: number;

    private state: ExecutionState = ExecutionState.Idle;
    private loaded: LoadedScript | null = null;
    private thread: ScriptThread | null = null;
    private completion: Promise<void> | null = null;
    private threadCounter = 0;
    private logLines: string[] = [];
    private errors: string[] = [];
    private lastError: Error | null = null;

    private executionCallback: ExecutionCallback | null;
    private logCallback: LogCallback | null;
    private printCallback: PrintCallback | null;

    /**
     * Debug mode flag - set to true to enable logging
     * Controlled by the VITE_DEBUG environment variable or set programmatically
     */
    static debug: boolean = isDebugEnabled();

    constructor(options: ScriptEngineOptions = {}) {
        this.registry = CommandRegistry.withNativeModules();
        for (const module of options.modules ?? []) {
            this.registry.loadModule(module);
        }
        for (const [name, effect] of Object.entries(options.effects ?? {})) {
            this.registry.registerEffect(name, effect);
        }

        this.parser = new ScriptParser(this.registry);
        this.clock = options.clock ?? systemClock;
        this.prompt = options.prompt ?? new UserPrompt();
        this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_ENGINE_OPTIONS.stopTimeoutMs;
        this.maxCallDepth = options.maxCallDepth ?? DEFAULT_ENGINE_OPTIONS.maxCallDepth;
        this.executionCallback = options.onStateChange ?? null;
        this.logCallback = options.onLog ?? null;
        this.printCallback = options.onPrint ?? null;
    }

    // ========================================================================
    // Parsing and loading
    // ========================================================================

    parse(script: string): ParseResult {
        return this.parser.parse(script);
    }

    validate(script: string): string[] {
        return this.parser.validate(script);
    }

    /**
     * Install a parse result as the program for the next start()
     *
     * @returns false while a run is live, or when the result has errors
     */
    load(result: ParseResult): boolean {
        if (this.isLive()) {
            this.logError('Cannot load a script while another script is running');
            return false;
        }
        if (!result.program || result.errors.length > 0) {
            this.logError('Cannot load a script with parse errors');
            return false;
        }

        this.loaded = {
            program: result.program,
            procedures: result.procedures,
            procedurePrograms: result.procedurePrograms,
            processedScript: result.processedScript
        };
        this.thread = null;
        this.completion = null;
        this.logLines = [];
        this.errors = [];
        this.lastError = null;
        this.setState(ExecutionState.Idle);
        return true;
    }

    /**
     * Parse, load and (by default) start a script.
     * A parse failure records every error and moves to Error.
     */
    executeScript(script: string, startImmediately: boolean = true): boolean {
        if (this.isLive()) {
            this.logError('Cannot execute a script while another script is running');
            return false;
        }

        const result = this.parse(script);
        if (!result.program || result.errors.length > 0) {
            this.loaded = null;
            this.thread = null;
            this.completion = null;
            this.logLines = [];
            this.errors = [];
            for (const error of result.errors) {
                this.recordParseError(error);
            }
            this.setState(ExecutionState.Error);
            return false;
        }

        this.load(result);
        this.log('Script parsed successfully');
        return startImmediately ? this.start() : true;
    }

    // ========================================================================
    // Control
    // ========================================================================

    /**
     * Start a run of the loaded program with fresh variables
     */
    start(): boolean {
        if (this.isLive()) {
            this.logError('Script is already running');
            return false;
        }
        if (!this.loaded) {
            this.logError('No script loaded');
            return false;
        }

        const thread = new ScriptThread(++this.threadCounter, this.loaded.program, this.loaded.procedurePrograms, {
            clock: this.clock,
            prompt: this.prompt,
            maxCallDepth: this.maxCallDepth,
            resolveEffect: (name) => this.registry.getEffect(name),
            log: (message) => this.log(message),
            print: (message) => this.emitPrint(message),
            onPaused: () => this.onThreadPaused(thread)
        });

        this.thread = thread;
        this.lastError = null;
        this.log('Starting script execution');
        this.setState(ExecutionState.Running);
        this.completion = thread.start().then((outcome) => this.finishRun(thread, outcome));
        return true;
    }

    /**
     * Request a pause; the state becomes Paused when the worker reaches the next suspension point
     */
    pause(): void {
        const thread = this.thread;
        if (this.state !== ExecutionState.Running || !thread || thread.control.isPauseRequested) {
            return;
        }
        this.log('Pausing script execution');
        thread.control.requestPause();
    }

    resume(): void {
        const thread = this.thread;
        if (!thread) {
            return;
        }
        if (this.state === ExecutionState.Paused) {
            this.log('Resuming script execution');
            thread.control.resume();
            this.setState(ExecutionState.Running);
        } else if (this.state === ExecutionState.Running && thread.control.isPauseRequested) {
            // The pause never took effect
            this.log('Resuming script execution');
            thread.control.resume();
        }
    }

    /**
     * Stop the run and return to Idle.
     *
     * @returns true when the worker exited within stopTimeoutMs; false when it was detached
     */
    async stop(): Promise<boolean> {
        if (this.state !== ExecutionState.Running && this.state !== ExecutionState.Paused && this.state !== ExecutionState.Error) {
            return true;
        }

        const thread = this.thread;
        const completion = this.completion;
        let exited = true;

        if (thread && completion && this.isLive()) {
            thread.control.requestStop();
            thread.abortPrompt('Script execution stopped');
            try {
                await withTimeout(completion, this.stopTimeoutMs, `Worker did not stop within ${this.stopTimeoutMs} ms`);
            } catch (error) {
                if (!(error instanceof TimeoutError)) {
                    throw error;
                }
                thread.detach();
                exited = false;
                this.logError(`${error.message}; detaching it`);
            }
        }

        if (this.thread === thread) {
            this.setState(ExecutionState.Idle);
            this.log('Script execution stopped');
        }
        return exited;
    }

    /**
     * Resolves with the state the current run ended in
     */
    async waitForCompletion(): Promise<ExecutionState> {
        if (this.completion) {
            await this.completion;
        }
        return this.state;
    }

    async dispose(): Promise<void> {
        if (this.isLive()) {
            await this.stop();
        }
        this.executionCallback = null;
        this.logCallback = null;
        this.printCallback = null;
    }

    // ========================================================================
    // Queries
    // ========================================================================

    getState(): ExecutionState {
        return this.state;
    }

    isRunning(): boolean {
        return this.state === ExecutionState.Running;
    }

    getLog(): string[] {
        return [...this.logLines];
    }

    getErrors(): string[] {
        return [...this.errors];
    }

    getLastError(): Error | null {
        return this.lastError;
    }

    getVariables(): Record<string, Value> {
        return this.thread ? this.thread.variables.snapshot() : {};
    }

    getVariable(name: string): Value {
        return this.thread ? this.thread.variables.get(name) : 0;
    }

    getProgress(): ExecutionProgress {
        if (this.thread) {
            return this.thread.tracker.snapshot();
        }
        return {
            currentLine: 0,
            currentOperation: '',
            currentIndex: 0,
            totalInstructions: this.loaded ? this.loaded.program.length : 0,
            executedInstructions: 0,
            progress: 0
        };
    }

    getProcessedScript(): string {
        return this.loaded ? this.loaded.processedScript : '';
    }

    getProcedures(): ProcedureTable {
        return this.loaded ? this.loaded.procedures : new Map();
    }

    // ========================================================================
    // Registration and help
    // ========================================================================

    registerCommand(name: string, definition: CommandDefinition, metadata?: CommandMetadata): void {
        this.registry.registerCommand(name, definition, metadata);
    }

    registerEffect(name: string, effect: Effect): void {
        this.registry.registerEffect(name, effect);
    }

    registerModule(module: ModuleAdapter): void {
        this.registry.loadModule(module);
    }

    getCommandHelp(name: string): CommandHelp | null {
        return this.registry.getCommandHelp(name);
    }

    listCommands(): string[] {
        return this.registry.listCommands();
    }

    // ========================================================================
    // Callbacks
    // ========================================================================

    setExecutionCallback(callback: ExecutionCallback | null): void {
        this.executionCallback = callback;
    }

    setLogCallback(callback: LogCallback | null): void {
        this.logCallback = callback;
    }

    setPrintCallback(callback: PrintCallback | null): void {
        this.printCallback = callback;
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private isLive(): boolean {
        return this.state === ExecutionState.Running || this.state === ExecutionState.Paused;
    }

    private onThreadPaused(thread: ScriptThread): void {
        if (thread === this.thread && this.state === ExecutionState.Running) {
            this.setState(ExecutionState.Paused);
        }
    }

    private finishRun(thread: ScriptThread, outcome: RunOutcome): void {
        if (thread !== this.thread || thread.isDetached) {
            return;
        }

        if (ScriptEngine.debug) {
            debugLog('ScriptEngine.finishRun', `Thread ${thread.id} finished: ${outcome.status}`);
        }

        switch (outcome.status) {
            case 'completed':
                this.log('Script execution completed successfully');
                this.setState(ExecutionState.Completed);
                break;
            case 'error':
                this.lastError = outcome.error;
                this.logError(outcome.error.message);
                this.setState(ExecutionState.Error);
                break;
            case 'stopped':
                // stop() moves the state to Idle once it has awaited the worker
                break;
        }
    }

    private recordParseError(error: ParseError): void {
        this.lastError = error;
        this.logError(error.toString());
    }

    private setState(state: ExecutionState): void {
        if (this.state === state) {
            return;
        }
        if (ScriptEngine.debug) {
            debugLog('ScriptEngine.setState', `${this.state} -> ${state}`);
        }
        this.state = state;
        this.notify(this.executionCallback, state);
    }

    private log(message: string): void {
        this.logLines.push(message);
        this.notify(this.logCallback, message);
    }

    private logError(message: string): void {
        this.errors.push(message);
        this.log(`ERROR: ${message}`);
    }

    private emitPrint(message: string): void {
        this.log(`PRINT: ${message}`);
        this.notify(this.printCallback, message);
    }

    /**
     * Observer failures are reported but never end a run
     */
    private notify<T>(callback: ((value: T) => void) | null, value: T): void {
        if (!callback) {
            return;
        }
        try {
            callback(value);
        } catch (error) {
            console.error('[ScriptEngine] Callback failed:', error);
        }
    }
}
