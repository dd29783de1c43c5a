import type {
    CommandDefinition,
    CommandMetadata,
    ModuleMetadata,
    ModuleAdapter
} from '../types/Environment.type';

/**
 * Motion module
 * Moves stages and hexapods along the motion graph, to stored points, or by a relative offset
 */

export const AXES = ['X', 'Y', 'Z', 'U', 'V', 'W'] as const;

export function isAxis(text: string): boolean {
    return AXES.some((axis) => axis === text.toUpperCase());
}

export const MotionCommands: Record<string, CommandDefinition> = {
    MOVE: {
        minArgs: 5,
        keywords: { 1: 'TO', 3: 'IN' }
    },

    MOVE_TO_POINT: {
        minArgs: 2
    },

    MOVE_RELATIVE: {
        minArgs: 3,
        numeric: [2],
        validate: (args) => isAxis(args[1]) ? null : `Unknown axis '${args[1]}', expected one of ${AXES.join(', ')}`
    }
};

export const MotionCommandMetadata: Record<string, CommandMetadata> = {
    MOVE: {
        syntax: 'MOVE <device> TO <node> IN <graph>',
        description: 'Moves a device to a node of a motion graph along the planned path',
        example: 'MOVE gantry-main TO Sled_Pick IN Process_Flow'
    },

    MOVE_TO_POINT: {
        syntax: 'MOVE_TO_POINT <device> <position>',
        description: 'Moves a device to a named position stored for it',
        example: 'MOVE_TO_POINT hex-left approachlens1'
    },

    MOVE_RELATIVE: {
        syntax: 'MOVE_RELATIVE <device> <axis> <distance>',
        description: 'Moves a device along one axis (X, Y, Z, U, V or W) by a relative distance',
        example: 'MOVE_RELATIVE hex-left Z -0.5'
    }
};

export const MotionModuleMetadata: ModuleMetadata = {
    description: 'Graph moves, named positions and relative axis moves',
    commands: Object.keys(MotionCommands)
};

const MotionModule: ModuleAdapter = {
    name: 'motion',
    commands: MotionCommands,
    commandMetadata: MotionCommandMetadata,
    moduleMetadata: MotionModuleMetadata
};

export default MotionModule;
