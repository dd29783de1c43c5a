import { describe, it, expect, vi } from 'vitest';
import { UserPrompt } from './UserPrompt';
import { CancelledError, ScriptError } from './exceptions';

describe('UserPrompt', () => {
    it('resolves true on confirm', async () => {
        const prompt = new UserPrompt();
        const answer = prompt.request('Load part');

        expect(prompt.isWaiting).toBe(true);
        expect(prompt.lastMessage).toBe('Load part');
        expect(prompt.confirm()).toBe(true);
        await expect(answer).resolves.toBe(true);
        expect(prompt.isWaiting).toBe(false);
    });

    it('resolves false on cancel', async () => {
        const prompt = new UserPrompt();
        const answer = prompt.request('Remove part');
        expect(prompt.cancel()).toBe(true);
        await expect(answer).resolves.toBe(false);
    });

    it('reports when nothing is waiting', () => {
        const prompt = new UserPrompt();
        expect(prompt.confirm()).toBe(false);
        expect(prompt.cancel()).toBe(false);
    });

    it('allows one request at a time', async () => {
        const prompt = new UserPrompt();
        const first = prompt.request('first');

        await expect(prompt.request('second')).rejects.toThrow(ScriptError);
        await expect(prompt.request('second')).rejects.toThrow('Another prompt is already waiting for confirmation');

        prompt.confirm();
        await expect(first).resolves.toBe(true);
    });

    it('rejects a waiting request on abort', async () => {
        const prompt = new UserPrompt();
        const answer = prompt.request('Load part');
        prompt.abort('Script execution stopped');

        await expect(answer).rejects.toBeInstanceOf(CancelledError);
        expect(prompt.isWaiting).toBe(false);
    });

    it('confirms immediately in auto-confirm mode', async () => {
        const prompt = new UserPrompt({ autoConfirm: true });
        await expect(prompt.request('unattended')).resolves.toBe(true);
        expect(prompt.isWaiting).toBe(false);
        expect(prompt.lastMessage).toBe('unattended');

        prompt.setAutoConfirm(false);
        const answer = prompt.request('attended');
        expect(prompt.isWaiting).toBe(true);
        prompt.confirm();
        await expect(answer).resolves.toBe(true);
    });

    it('notifies listeners until they unsubscribe', async () => {
        const prompt = new UserPrompt();
        const listener = vi.fn();
        const unsubscribe = prompt.onRequest(listener);

        const first = prompt.request('one');
        prompt.confirm();
        await first;

        unsubscribe();
        const second = prompt.request('two');
        prompt.confirm();
        await second;

        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener).toHaveBeenCalledWith('one');
    });
});
