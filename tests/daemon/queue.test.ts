import { describe, it, expect, vi } from 'vitest';
import { Lane } from '../../src/daemon';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Work lane', () => {
    it('handles items one at a time in arrival order', async () => {
        const seen: number[] = [];
        let active = 0;
        let maxActive = 0;
        const lane = Lane.create<number>('test', async item => {
            active++;
            maxActive = Math.max(maxActive, active);
            await new Promise(resolve => setTimeout(resolve, 5));
            seen.push(item);
            active--;
        });

        lane.push(1);
        lane.push(2);
        lane.push(3);
        expect(lane.busy()).toBe(true);
        expect(lane.pending()).toBe(2);

        await lane.drain();

        expect(seen).toEqual([1, 2, 3]);
        expect(maxActive).toBe(1);
        expect(lane.pending()).toBe(0);
        expect(lane.busy()).toBe(false);
    });

    it('keeps going after a handler fails', async () => {
        const seen: string[] = [];
        const lane = Lane.create<string>('test', async item => {
            if (item === 'bad') throw new Error('boom');
            seen.push(item);
        });

        lane.push('a');
        lane.push('bad');
        lane.push('b');
        await lane.drain();

        expect(seen).toEqual(['a', 'b']);
    });

    it('picks up items pushed after it ran dry', async () => {
        const seen: number[] = [];
        const lane = Lane.create<number>('test', async item => {
            seen.push(item);
        });

        lane.push(1);
        await lane.drain();
        lane.push(2);
        await lane.drain();

        expect(seen).toEqual([1, 2]);
    });

    it('refuses new items once closed and lets the current one finish', async () => {
        const seen: number[] = [];
        const lane = Lane.create<number>('test', async item => {
            await new Promise(resolve => setTimeout(resolve, 5));
            seen.push(item);
        });

        lane.push(1);
        lane.push(2);
        await lane.close();

        expect(lane.push(3)).toBe(false);
        expect(seen).toEqual([1]);
    });
});
