/**
 * ScriptRunner: numbered slots, each bound to a script file and its own engine
 *
 * Slot assignments live in a JSON5 configuration file:
 *
 *   {
 *     visibleSlotCount: 10,
 *     slots: [
 *       { scriptPath: 'align_left.txt', displayName: 'Align left', description: '', enabled: true },
 *     ],
 *   }
 *
 * Script paths are resolved against the configuration file's directory.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import JSON5 from 'json5';
import { ScriptEngine } from './ScriptEngine';
import { UserPrompt } from './UserPrompt';
import { ExecutionState, type Effect, type ScriptEngineOptions } from '../types/Environment.type';
import { formatParseErrors, systemClock, isDebugEnabled, debugLog } from '../utils';

export interface SlotConfig {
    scriptPath: string;
    displayName: string;
    description: string;
    enabled: boolean;
}

export interface RunnerConfiguration {
    slots: SlotConfig[];
    visibleSlotCount: number;
}

export interface SlotSnapshot extends SlotConfig {
    index: number;
    isExecuting: boolean;
    lastState: ExecutionState;
    lastError: string;
    currentOperation: string;
    startedAt: number | null; // Clock time of the last start
    log: string[];
}

export type RunnerEngineOptions = Omit<ScriptEngineOptions, 'onStateChange' | 'onLog' | 'onPrint' | 'effects' | 'prompt'>;

export interface ScriptRunnerOptions {
    configPath?: string;
    effects?: Record<string, Effect>;
    engineOptions?: RunnerEngineOptions;
}

interface Slot {
    config: SlotConfig;
    engine: ScriptEngine | null;
    prompt: UserPrompt;
    isExecuting: boolean;
    isStarting: boolean; // Set from the executeSlot call until its engine starts or it gives up
    lastState: ExecutionState;
    lastError: string;
    startedAt: number | null;
    log: string[];
}

const SCRIPT_EXTENSIONS = new Set(['.txt', '.script']);

function emptySlotConfig(): SlotConfig {
    return { scriptPath: '', displayName: '', description: '', enabled: false };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string {
    const value = record[key];
    return typeof value === 'string' ? value : '';
}

export class ScriptRunner {
    static readonly NUM_SLOTS = 20;
    static readonly DEFAULT_VISIBLE_SLOTS = 10;
    static readonly DEFAULT_CONFIG_FILE = 'scripts/script_runner_config.json';
    static readonly MAX_LOG_LINES = 1000;

    static debug: boolean = isDebugEnabled();

    private configPath: string;
    private effects: Record<string, Effect>;
    private engineOptions: RunnerEngineOptions;
    private slots: Slot[];
    private visibleSlotCount: number = ScriptRunner.DEFAULT_VISIBLE_SLOTS;

    constructor(options: ScriptRunnerOptions = {}) {
        this.configPath = options.configPath ?? ScriptRunner.DEFAULT_CONFIG_FILE;
        this.effects = options.effects ?? {};
        this.engineOptions = options.engineOptions ?? {};
        this.slots = Array.from({ length: ScriptRunner.NUM_SLOTS }, () => ScriptRunner.createSlot(emptySlotConfig()));
    }

    // ========================================================================
    // Configuration
    // ========================================================================

    /**
     * Read slot assignments. A missing file leaves every slot empty and resolves false.
     *
     * @throws Error when the file exists but is not a valid configuration
     */
    async loadConfiguration(): Promise<boolean> {
        let text: string;
        try {
            text = await fs.readFile(this.configPath, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                this.resetSlots();
                return false;
            }
            throw error;
        }

        const configuration = ScriptRunner.parseConfiguration(JSON5.parse(text), this.configPath);
        this.resetSlots();
        configuration.slots.forEach((config, index) => {
            this.slots[index] = ScriptRunner.createSlot(config);
        });
        this.visibleSlotCount = configuration.visibleSlotCount;

        if (ScriptRunner.debug) {
            debugLog('ScriptRunner.loadConfiguration', `Loaded ${configuration.slots.length} slot(s) from ${this.configPath}`);
        }
        return true;
    }

    async saveConfiguration(): Promise<void> {
        const configuration: RunnerConfiguration = {
            slots: this.slots.map((slot) => ({ ...slot.config })),
            visibleSlotCount: this.visibleSlotCount
        };
        await fs.mkdir(path.dirname(this.configPath), { recursive: true });
        await fs.writeFile(this.configPath, JSON.stringify(configuration, null, 4) + '\n', 'utf8');
    }

    /**
     * Validate parsed configuration data. Slots beyond NUM_SLOTS are ignored.
     */
    static parseConfiguration(data: unknown, source: string): RunnerConfiguration {
        if (!isRecord(data)) {
            throw new Error(`Invalid script runner configuration in ${source}: expected an object`);
        }

        const rawSlots = data.slots ?? [];
        if (!Array.isArray(rawSlots)) {
            throw new Error(`Invalid script runner configuration in ${source}: "slots" must be an array`);
        }

        const slots = rawSlots.slice(0, ScriptRunner.NUM_SLOTS).map((entry: unknown, index): SlotConfig => {
            if (!isRecord(entry)) {
                throw new Error(`Invalid script runner configuration in ${source}: slot ${index} must be an object`);
            }
            const scriptPath = readString(entry, 'scriptPath');
            return {
                scriptPath,
                displayName: readString(entry, 'displayName'),
                description: readString(entry, 'description'),
                enabled: typeof entry.enabled === 'boolean' ? entry.enabled : scriptPath.length > 0
            };
        });

        const visible = data.visibleSlotCount;
        const visibleSlotCount = typeof visible === 'number' && Number.isInteger(visible)
            ? Math.min(Math.max(visible, 1), ScriptRunner.NUM_SLOTS)
            : ScriptRunner.DEFAULT_VISIBLE_SLOTS;

        return { slots, visibleSlotCount };
    }

    getVisibleSlotCount(): number {
        return this.visibleSlotCount;
    }

    setVisibleSlotCount(count: number): void {
        this.visibleSlotCount = Math.min(Math.max(Math.trunc(count), 1), ScriptRunner.NUM_SLOTS);
    }

    // ========================================================================
    // Slots
    // ========================================================================

    assignScriptToSlot(index: number, scriptPath: string, displayName: string, description: string = ''): void {
        const slot = this.getSlotState(index);
        if (ScriptRunner.isBusy(slot)) {
            throw new Error(`Slot ${index} is executing`);
        }
        slot.config = { scriptPath, displayName, description, enabled: true };
        slot.lastError = '';
    }

    clearSlot(index: number): void {
        const slot = this.getSlotState(index);
        if (ScriptRunner.isBusy(slot)) {
            throw new Error(`Slot ${index} is executing`);
        }
        this.slots[index] = ScriptRunner.createSlot(emptySlotConfig());
    }

    /**
     * The slot's own prompt bridge; the operator interface confirms or cancels its PROMPTs here
     */
    getSlotPrompt(index: number): UserPrompt {
        return this.getSlotState(index).prompt;
    }

    getSlot(index: number): SlotSnapshot {
        const slot = this.getSlotState(index);
        return {
            ...slot.config,
            index,
            isExecuting: slot.isExecuting,
            lastState: slot.lastState,
            lastError: slot.lastError,
            currentOperation: slot.engine ? slot.engine.getProgress().currentOperation : '',
            startedAt: slot.startedAt,
            log: [...slot.log]
        };
    }

    /**
     * Read the slot's script and start it
     *
     * @returns false when the slot is empty, disabled, busy, unreadable, or the script does not parse
     */
    async executeSlot(index: number): Promise<boolean> {
        const slot = this.getSlotState(index);
        if (!slot.config.enabled || slot.config.scriptPath.length === 0 || ScriptRunner.isBusy(slot)) {
            return false;
        }

        slot.isStarting = true;
        try {
            return await this.startSlot(index, slot);
        } finally {
            slot.isStarting = false;
        }
    }

    async stopSlot(index: number): Promise<boolean> {
        const slot = this.getSlotState(index);
        if (!slot.engine) {
            return true;
        }
        return slot.engine.stop();
    }

    /**
     * Resolves with the state the slot's current run ended in
     */
    async waitForSlot(index: number): Promise<ExecutionState> {
        const slot = this.getSlotState(index);
        return slot.engine ? slot.engine.waitForCompletion() : slot.lastState;
    }

    /**
     * Script files next to the configuration file
     */
    async listScriptFiles(): Promise<string[]> {
        const directory = path.dirname(this.configPath);
        let entries: string[];
        try {
            entries = await fs.readdir(directory);
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return [];
            }
            throw error;
        }
        return entries.filter((entry) => SCRIPT_EXTENSIONS.has(path.extname(entry).toLowerCase())).sort();
    }

    async dispose(): Promise<void> {
        for (const slot of this.slots) {
            if (slot.engine) {
                await slot.engine.dispose();
            }
        }
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private static createSlot(config: SlotConfig): Slot {
        return {
            config,
            engine: null,
            prompt: new UserPrompt(),
            isExecuting: false,
            isStarting: false,
            lastState: ExecutionState.Idle,
            lastError: '',
            startedAt: null,
            log: []
        };
    }

    /**
     * Read, parse and start the slot's script. The caller holds the slot's isStarting reservation.
     */
    private async startSlot(index: number, slot: Slot): Promise<boolean> {
        const scriptPath = this.resolveScriptPath(slot.config.scriptPath);
        let script: string;
        try {
            script = await fs.readFile(scriptPath, 'utf8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            slot.lastError = `Failed to load script: ${scriptPath} (${reason})`;
            return false;
        }

        const engine = this.getEngine(index, slot);
        slot.log = [];
        slot.lastError = '';
        slot.startedAt = (this.engineOptions.clock ?? systemClock).now();

        if (!engine.executeScript(script)) {
            const result = engine.parse(script);
            slot.lastError = result.errors.length > 0
                ? formatParseErrors(result.errors, script)
                : engine.getErrors().join('\n');
            return false;
        }
        return true;
    }

    private static isBusy(slot: Slot): boolean {
        return slot.isExecuting || slot.isStarting;
    }

    private resetSlots(): void {
        this.slots = Array.from({ length: ScriptRunner.NUM_SLOTS }, () => ScriptRunner.createSlot(emptySlotConfig()));
        this.visibleSlotCount = ScriptRunner.DEFAULT_VISIBLE_SLOTS;
    }

    private getSlotState(index: number): Slot {
        if (!Number.isInteger(index) || index < 0 || index >= ScriptRunner.NUM_SLOTS) {
            throw new RangeError(`Slot index out of range: ${index}`);
        }
        return this.slots[index];
    }

    private resolveScriptPath(scriptPath: string): string {
        return path.resolve(path.dirname(this.configPath), scriptPath);
    }

    private getEngine(index: number, slot: Slot): ScriptEngine {
        if (slot.engine) {
            return slot.engine;
        }
        const engine = new ScriptEngine({
            ...this.engineOptions,
            effects: this.effects,
            prompt: slot.prompt,
            onStateChange: (state) => this.onSlotStateChange(index, state),
            onLog: (message) => this.onSlotLog(index, message)
        });
        slot.engine = engine;
        return engine;
    }

    private onSlotStateChange(index: number, state: ExecutionState): void {
        const slot = this.slots[index];
        slot.lastState = state;
        slot.isExecuting = state === ExecutionState.Running || state === ExecutionState.Paused;
        if (state === ExecutionState.Error && slot.engine) {
            const lastError = slot.engine.getLastError();
            if (lastError) {
                slot.lastError = lastError.message;
            }
        }
    }

    private onSlotLog(index: number, message: string): void {
        const slot = this.slots[index];
        slot.log.push(message);
        if (slot.log.length > ScriptRunner.MAX_LOG_LINES) {
            slot.log.splice(0, slot.log.length - ScriptRunner.MAX_LOG_LINES);
        }
    }
}
