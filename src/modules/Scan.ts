import type {
    CommandDefinition,
    CommandMetadata,
    ModuleMetadata,
    ModuleAdapter
} from '../types/Environment.type';
import { isNumericLiteral } from '../utils';
import { isAxis } from './Motion';

/**
 * Scan module
 * Optical alignment scans over one or more axes
 */

/**
 * Comma-separated list, e.g. "0.01,0.005" or "X,Y"
 */
export function splitList(text: string): string[] {
    return text.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

function validateScan(args: readonly string[]): string | null {
    const steps = splitList(args[2]);
    if (steps.length === 0 || !steps.every((step) => isNumericLiteral(step) && Number(step) > 0)) {
        return `Invalid step sizes '${args[2]}', expected comma-separated positive numbers`;
    }
    if (args.length > 4) {
        const axes = splitList(args[4]);
        if (axes.length === 0 || !axes.every(isAxis)) {
            return `Invalid axes '${args[4]}', expected comma-separated axis letters`;
        }
    }
    return null;
}

export const ScanCommands: Record<string, CommandDefinition> = {
    RUN_SCAN: {
        minArgs: 3,
        maxArgs: 5,
        numeric: [3],
        validate: validateScan
    }
};

export const ScanCommandMetadata: Record<string, CommandMetadata> = {
    RUN_SCAN: {
        syntax: 'RUN_SCAN <device> <channel> <step_sizes> [settling_time] [axes]',
        description: 'Scans a device over its axes maximizing a data channel, refining through each step size',
        example: 'RUN_SCAN hex-left GPIB-Current 0.002,0.001,0.0005 300 Z,X,Y'
    }
};

export const ScanModuleMetadata: ModuleMetadata = {
    description: 'Optical alignment scans',
    commands: Object.keys(ScanCommands)
};

const ScanModule: ModuleAdapter = {
    name: 'scan',
    commands: ScanCommands,
    commandMetadata: ScanCommandMetadata,
    moduleMetadata: ScanModuleMetadata
};

export default ScanModule;
