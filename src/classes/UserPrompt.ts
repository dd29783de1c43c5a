/**
 * UserPrompt: bridges PROMPT to an operator interface
 *
 * request() parks the worker until the interface calls confirm() or cancel().
 */

import type { PromptHandler } from '../types/Environment.type';
import { CancelledError, ScriptError } from './exceptions';

export type PromptListener = (message: string) => void;

export interface UserPromptOptions {
    autoConfirm?: boolean; // Confirm every request immediately (unattended runs, tests)
}

interface PendingRequest {
    message: string;
    resolve: (confirmed: boolean) => void;
    reject: (error: Error) => void;
}

export class UserPrompt implements PromptHandler {
    private autoConfirm: boolean;
    private pending: PendingRequest | null = null;
    private lastMessageText = '';
    private listeners: Set<PromptListener> = new Set();

    constructor(options: UserPromptOptions = {}) {
        this.autoConfirm = options.autoConfirm ?? false;
    }

    request(message: string): Promise<boolean> {
        this.lastMessageText = message;
        if (this.autoConfirm) {
            return Promise.resolve(true);
        }
        if (this.pending) {
            return Promise.reject(new ScriptError('Another prompt is already waiting for confirmation'));
        }
        return new Promise<boolean>((resolve, reject) => {
            this.pending = { message, resolve, reject };
            for (const listener of this.listeners) {
                listener(message);
            }
        });
    }

    /**
     * @returns false when nothing was waiting
     */
    confirm(): boolean {
        return this.settle(true);
    }

    cancel(): boolean {
        return this.settle(false);
    }

    /**
     * Reject a waiting request; used when the run is stopped
     */
    abort(reason: string): void {
        const pending = this.pending;
        this.pending = null;
        if (pending) {
            pending.reject(new CancelledError(reason));
        }
    }

    setAutoConfirm(autoConfirm: boolean): void {
        this.autoConfirm = autoConfirm;
    }

    /**
     * @returns a function that removes the listener
     */
    onRequest(listener: PromptListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    get isWaiting(): boolean {
        return this.pending !== null;
    }

    get lastMessage(): string {
        return this.lastMessageText;
    }

    private settle(confirmed: boolean): boolean {
        const pending = this.pending;
        this.pending = null;
        if (!pending) {
            return false;
        }
        pending.resolve(confirmed);
        return true;
    }
}
