/**
 * Simulated hardware effects for dry runs
 *
 * Every hardware command succeeds without touching a device. READ_INPUT
 * returns the value configured for `<device>:<pin>`, or 0.
 */

import type { Effect } from '../types/Environment.type';
import { MotionCommands } from './Motion';
import { IoCommands } from './Io';
import { PneumaticCommands } from './Pneumatic';
import { LaserCommands } from './Laser';
import { ScanCommands } from './Scan';

export interface SimulationOptions {
    inputs?: Record<string, number>; // "<device>:<pin>" -> value
    onOperation?: (description: string) => void;
}

export const SIMULATED_COMMANDS: readonly string[] = [
    ...Object.keys(MotionCommands),
    ...Object.keys(IoCommands),
    ...Object.keys(PneumaticCommands),
    ...Object.keys(LaserCommands),
    ...Object.keys(ScanCommands)
];

export function createSimulatedEffects(options: SimulationOptions = {}): Record<string, Effect> {
    const effects: Record<string, Effect> = {};

    for (const name of SIMULATED_COMMANDS) {
        effects[name] = (context) => {
            options.onOperation?.(context.instruction.description);
            return { success: true, description: `Simulated ${context.instruction.description}` };
        };
    }

    effects.READ_INPUT = (context) => {
        const pin = context.number(1);
        const key = `${context.args[0]}:${pin}`;
        const value = options.inputs?.[key] ?? 0;
        options.onOperation?.(context.instruction.description);
        return { success: true, description: `Simulated read ${key} = ${value}`, value };
    };

    return effects;
}
