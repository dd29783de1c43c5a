/**
 * Registry of commands, their effects and help metadata
 */

import type {
    CommandDefinition,
    CommandMetadata,
    CommandHelp,
    Effect,
    ModuleAdapter,
    ModuleMetadata
} from '../types/Environment.type';
import { RESERVED_WORDS } from './Tokenizer';
import MotionModule from '../modules/Motion';
import IoModule from '../modules/Io';
import PneumaticModule from '../modules/Pneumatic';
import LaserModule from '../modules/Laser';
import ScanModule from '../modules/Scan';
import UtilityModule from '../modules/Utility';

export class CommandRegistry {
    /**
     * Modules every engine starts with
     */
    static readonly NATIVE_MODULES: ModuleAdapter[] = [
        MotionModule,
        IoModule,
        PneumaticModule,
        LaserModule,
        ScanModule,
        UtilityModule
    ];

    private definitions: Map<string, CommandDefinition> = new Map();
    private metadata: Map<string, CommandMetadata> = new Map();
    private effects: Map<string, Effect> = new Map();
    private owners: Map<string, string> = new Map(); // command -> module name
    private moduleMetadata: Map<string, ModuleMetadata> = new Map();

    static withNativeModules(): CommandRegistry {
        const registry = new CommandRegistry();
        for (const module of CommandRegistry.NATIVE_MODULES) {
            registry.loadModule(module);
        }
        return registry;
    }

    loadModule(module: ModuleAdapter): void {
        for (const [name, definition] of Object.entries(module.commands)) {
            this.registerCommand(name, definition, module.commandMetadata[name]);
            this.owners.set(name.toUpperCase(), module.name);
        }
        for (const [name, effect] of Object.entries(module.effects ?? {})) {
            this.registerEffect(name, effect);
        }
        this.moduleMetadata.set(module.name, module.moduleMetadata);
    }

    registerCommand(name: string, definition: CommandDefinition, metadata?: CommandMetadata): void {
        const key = name.toUpperCase();
        if (RESERVED_WORDS.has(key)) {
            throw new Error(`Cannot register reserved word as a command: ${key}`);
        }
        if (!/^[A-Z_][A-Z0-9_]*$/.test(key)) {
            throw new Error(`Invalid command name: ${name}`);
        }
        this.definitions.set(key, definition);
        if (metadata) {
            this.metadata.set(key, metadata);
        }
    }

    registerEffect(name: string, effect: Effect): void {
        this.effects.set(name.toUpperCase(), effect);
    }

    getDefinition(name: string): CommandDefinition | undefined {
        return this.definitions.get(name.toUpperCase());
    }

    getMetadata(name: string): CommandMetadata | undefined {
        return this.metadata.get(name.toUpperCase());
    }

    getEffect(name: string): Effect | undefined {
        return this.effects.get(name.toUpperCase());
    }

    getModuleMetadata(name: string): ModuleMetadata | undefined {
        return this.moduleMetadata.get(name);
    }

    listCommands(): string[] {
        return [...this.definitions.keys()].sort();
    }

    getCommandHelp(name: string): CommandHelp | null {
        const key = name.toUpperCase();
        if (!this.definitions.has(key)) {
            return null;
        }
        const metadata = this.metadata.get(key);
        return {
            name: key,
            module: this.owners.get(key) ?? null,
            syntax: metadata?.syntax ?? key,
            description: metadata?.description ?? '',
            example: metadata?.example ?? ''
        };
    }
}
