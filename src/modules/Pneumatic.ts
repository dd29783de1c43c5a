import type {
    CommandDefinition,
    CommandMetadata,
    ModuleMetadata,
    ModuleAdapter
} from '../types/Environment.type';

/**
 * Pneumatic module
 */

export const PneumaticCommands: Record<string, CommandDefinition> = {
    EXTEND_SLIDE: { minArgs: 1 },
    RETRACT_SLIDE: { minArgs: 1 }
};

export const PneumaticCommandMetadata: Record<string, CommandMetadata> = {
    EXTEND_SLIDE: {
        syntax: 'EXTEND_SLIDE <slide>',
        description: 'Extends a pneumatic slide and waits for its end sensor',
        example: 'EXTEND_SLIDE UV_Head'
    },

    RETRACT_SLIDE: {
        syntax: 'RETRACT_SLIDE <slide>',
        description: 'Retracts a pneumatic slide and waits for its home sensor',
        example: 'RETRACT_SLIDE UV_Head'
    }
};

export const PneumaticModuleMetadata: ModuleMetadata = {
    description: 'Pneumatic slide control',
    commands: Object.keys(PneumaticCommands)
};

const PneumaticModule: ModuleAdapter = {
    name: 'pneumatic',
    commands: PneumaticCommands,
    commandMetadata: PneumaticCommandMetadata,
    moduleMetadata: PneumaticModuleMetadata
};

export default PneumaticModule;
