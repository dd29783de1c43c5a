import type {
    CommandDefinition,
    CommandMetadata,
    ModuleMetadata,
    ModuleAdapter
} from '../types/Environment.type';

/**
 * Laser module
 * Laser output and thermo-electric cooler (TEC) control. The laser name is
 * optional everywhere; without it the default laser is used.
 */

export const LaserCommands: Record<string, CommandDefinition> = {
    LASER_ON: { minArgs: 0, maxArgs: 1 },
    LASER_OFF: { minArgs: 0, maxArgs: 1 },
    TEC_ON: { minArgs: 0, maxArgs: 1 },
    TEC_OFF: { minArgs: 0, maxArgs: 1 },

    SET_LASER_CURRENT: {
        minArgs: 1,
        maxArgs: 2,
        numeric: [0]
    },

    SET_TEC_TEMPERATURE: {
        minArgs: 1,
        maxArgs: 2,
        numeric: [0]
    },

    WAIT_FOR_TEMPERATURE: {
        minArgs: 1,
        maxArgs: 4,
        numeric: [0, 1, 2]
    }
};

export const LaserCommandMetadata: Record<string, CommandMetadata> = {
    LASER_ON: {
        syntax: 'LASER_ON [laser]',
        description: 'Turns the laser output on',
        example: 'LASER_ON'
    },

    LASER_OFF: {
        syntax: 'LASER_OFF [laser]',
        description: 'Turns the laser output off',
        example: 'LASER_OFF'
    },

    TEC_ON: {
        syntax: 'TEC_ON [laser]',
        description: 'Turns the TEC on',
        example: 'TEC_ON'
    },

    TEC_OFF: {
        syntax: 'TEC_OFF [laser]',
        description: 'Turns the TEC off',
        example: 'TEC_OFF'
    },

    SET_LASER_CURRENT: {
        syntax: 'SET_LASER_CURRENT <current> [laser]',
        description: 'Sets the laser drive current in amperes',
        example: 'SET_LASER_CURRENT 0.15'
    },

    SET_TEC_TEMPERATURE: {
        syntax: 'SET_TEC_TEMPERATURE <temperature> [laser]',
        description: 'Sets the TEC target temperature in degrees Celsius',
        example: 'SET_TEC_TEMPERATURE 25.0'
    },

    WAIT_FOR_TEMPERATURE: {
        syntax: 'WAIT_FOR_TEMPERATURE <temp> [tolerance] [timeout_ms] [laser]',
        description: 'Waits until the laser temperature is within tolerance of the target',
        example: 'WAIT_FOR_TEMPERATURE 25.0 0.5 30000'
    }
};

export const LaserModuleMetadata: ModuleMetadata = {
    description: 'Laser output, drive current and TEC temperature control',
    commands: Object.keys(LaserCommands)
};

const LaserModule: ModuleAdapter = {
    name: 'laser',
    commands: LaserCommands,
    commandMetadata: LaserCommandMetadata,
    moduleMetadata: LaserModuleMetadata
};

export default LaserModule;
