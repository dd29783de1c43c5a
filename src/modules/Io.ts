import type {
    CommandDefinition,
    CommandMetadata,
    ModuleMetadata,
    ModuleAdapter
} from '../types/Environment.type';

/**
 * I/O module
 * Digital outputs and inputs of I/O controllers
 */

const OUTPUT_STATES = new Set(['ON', 'OFF', 'TRUE', 'FALSE', '1', '0']);

export const IoCommands: Record<string, CommandDefinition> = {
    SET_OUTPUT: {
        minArgs: 3,
        maxArgs: 4,
        numeric: [1, 3],
        validate: (args) => OUTPUT_STATES.has(args[2].toUpperCase()) ? null : `Invalid output state '${args[2]}', expected ON or OFF`
    },

    READ_INPUT: {
        minArgs: 3,
        numeric: [1],
        storesInto: 2
    },

    CLEAR_LATCH: {
        minArgs: 2,
        numeric: [1]
    }
};

export const IoCommandMetadata: Record<string, CommandMetadata> = {
    SET_OUTPUT: {
        syntax: 'SET_OUTPUT <device> <pin> <ON|OFF> [delay_ms]',
        description: 'Sets a digital output, optionally waiting afterwards',
        example: 'SET_OUTPUT IOBottom 0 ON 200'
    },

    READ_INPUT: {
        syntax: 'READ_INPUT <device> <pin> $variable',
        description: 'Reads a digital input into a variable (1 = high, 0 = low)',
        example: 'READ_INPUT IOBottom 3 $sensor'
    },

    CLEAR_LATCH: {
        syntax: 'CLEAR_LATCH <device> <pin>',
        description: 'Clears the latched state of a digital input',
        example: 'CLEAR_LATCH IOBottom 3'
    }
};

export const IoModuleMetadata: ModuleMetadata = {
    description: 'Digital output, input and latch control',
    commands: Object.keys(IoCommands)
};

const IoModule: ModuleAdapter = {
    name: 'io',
    commands: IoCommands,
    commandMetadata: IoCommandMetadata,
    moduleMetadata: IoModuleMetadata
};

export default IoModule;
