import type {
    CommandDefinition,
    CommandMetadata,
    ModuleMetadata,
    ModuleAdapter,
    Effect
} from '../types/Environment.type';

/**
 * Utility module
 * Delays, operator prompts and printed messages. Unlike the hardware modules
 * it ships its own effects.
 */

export const UtilityCommands: Record<string, CommandDefinition> = {
    WAIT: {
        minArgs: 1,
        numeric: [0]
    },

    PROMPT: {
        minArgs: 1,
        maxArgs: 1,
        message: true
    },

    PRINT: {
        minArgs: 1,
        maxArgs: 1,
        message: true
    }
};

export const UtilityEffects: Record<string, Effect> = {
    WAIT: async (context) => {
        const ms = context.number(0);
        if (ms < 0) {
            return { success: false, description: `Wait duration must not be negative, got ${ms}` };
        }
        await context.clock.delay(ms);
        return { success: true, description: `Waited ${ms} ms` };
    },

    PROMPT: async (context) => {
        const message = context.interpolate(context.args[0]);
        const confirmed = await context.prompt.request(message);
        if (!confirmed) {
            return { success: false, description: `Cancelled by operator: ${message}` };
        }
        return { success: true, description: `Confirmed: ${message}` };
    },

    PRINT: (context) => {
        const message = context.interpolate(context.args[0]);
        context.print(message);
        return { success: true, description: `Printed: ${message}` };
    }
};

export const UtilityCommandMetadata: Record<string, CommandMetadata> = {
    WAIT: {
        syntax: 'WAIT <milliseconds>',
        description: 'Pauses the script for a number of milliseconds',
        example: 'WAIT 500'
    },

    PROMPT: {
        syntax: 'PROMPT <message>',
        description: 'Shows a message and waits for the operator to confirm; cancelling fails the script',
        example: 'PROMPT "Load the next part and press confirm"'
    },

    PRINT: {
        syntax: 'PRINT <message>',
        description: 'Writes a message to the log; $variables are replaced by their values',
        example: 'PRINT "Pass $i of 3"'
    }
};

export const UtilityModuleMetadata: ModuleMetadata = {
    description: 'Delays, operator prompts and messages',
    commands: Object.keys(UtilityCommands)
};

const UtilityModule: ModuleAdapter = {
    name: 'utility',
    commands: UtilityCommands,
    commandMetadata: UtilityCommandMetadata,
    moduleMetadata: UtilityModuleMetadata,
    effects: UtilityEffects
};

export default UtilityModule;
