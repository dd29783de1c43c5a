/**
 * Stop and pause requests shared between the controlling caller and a run's worker.
 *
 * The worker calls checkpoint() between instructions. A pending pause parks it
 * on a promise gate that resume() or requestStop() opens. Every YIELD_INTERVAL
 * checkpoints the worker also yields a macrotask, so timers and I/O callbacks
 * (and with them pause and stop requests) run even in a loop without effects.
 */

import { yieldToEventLoop } from '../utils';

export class ExecutionControl {
    static readonly YIELD_INTERVAL = 64;

    private stopRequested = false;
    private pauseRequested = false;
    private gateResolve: (() => void) | null = null;
    private onPaused: () => void;
    private checkpoints = 0;

    /**
     * @param onPaused - Called when the worker parks on the gate
     */
    constructor(onPaused: () => void) {
        this.onPaused = onPaused;
    }

    get isStopRequested(): boolean {
        return this.stopRequested;
    }

    get isPauseRequested(): boolean {
        return this.pauseRequested;
    }

    get isParked(): boolean {
        return this.gateResolve !== null;
    }

    requestPause(): void {
        if (!this.stopRequested) {
            this.pauseRequested = true;
        }
    }

    /**
     * Cancel a pending pause, or release a parked worker
     */
    resume(): void {
        this.pauseRequested = false;
        this.openGate();
    }

    requestStop(): void {
        this.stopRequested = true;
        this.pauseRequested = false;
        this.openGate();
    }

    /**
     * Suspension point. Resolves false when the run must end.
     */
    async checkpoint(): Promise<boolean> {
        if (++this.checkpoints % ExecutionControl.YIELD_INTERVAL === 0) {
            await yieldToEventLoop();
        }
        if (this.stopRequested) {
            return false;
        }
        if (this.pauseRequested) {
            // The gate exists before observers hear about the pause, so a
            // resume() issued from inside the callback still opens it.
            const gate = new Promise<void>((resolve) => {
                this.gateResolve = resolve;
            });
            this.onPaused();
            await gate;
            return !this.stopRequested;
        }
        return true;
    }

    private openGate(): void {
        const resolve = this.gateResolve;
        this.gateResolve = null;
        if (resolve) {
            resolve();
        }
    }
}
