/**
 * Per-run variable storage. Keys include the leading `$`; unknown names read as 0.
 */

import type { Value, VariableLookup } from '../utils';

export class VariableStore implements VariableLookup {
    private values: Map<string, Value> = new Map();

    get(name: string): Value {
        return this.values.get(name) ?? 0;
    }

    set(name: string, value: Value): void {
        this.values.set(name, value);
    }

    has(name: string): boolean {
        return this.values.has(name);
    }

    clear(): void {
        this.values.clear();
    }

    get size(): number {
        return this.values.size;
    }

    /**
     * Copy of the current values, safe to hand to observers
     */
    snapshot(): Record<string, Value> {
        return Object.fromEntries(this.values);
    }
}
