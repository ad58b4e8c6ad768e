/**
 * Work Lane
 *
 * A FIFO queue with exactly one consumer. Items are kept in an array with a
 * read cursor; the consumed prefix is dropped whenever the lane runs dry.
 */

import * as Logging from '../logging';
import { errorMessage } from '../errors';

export interface LaneInstance<T> {
    readonly name: string;
    /** Returns false once the lane is closed. */
    push(item: T): boolean;
    pending(): number;
    busy(): boolean;
    /** Resolves when nothing is running and nothing is waiting. */
    drain(): Promise<void>;
    /** Stops taking items; the item in flight is allowed to finish. */
    close(): Promise<void>;
}

export const create = <T>(name: string, handler: (item: T) => Promise<void>): LaneInstance<T> => {
    const logger = Logging.getLogger();
    const items: T[] = [];
    let cursor = 0;
    let closed = false;
    let running: Promise<void> | null = null;

    const consume = async (): Promise<void> => {
        while (!closed && cursor < items.length) {
            const item = items[cursor];
            cursor++;
            try {
                await handler(item);
            } catch (error) {
                logger.error('Lane %s handler failed: %s', name, errorMessage(error));
            }
        }
        items.splice(0, cursor);
        cursor = 0;
    };

    const start = (): void => {
        if (running || closed || cursor >= items.length) return;
        running = consume().finally(() => {
            running = null;
            // Items pushed while the loop was finishing
            start();
        });
    };

    const drain = async (): Promise<void> => {
        while (running) {
            await running;
        }
    };

    return {
        name,
        push: item => {
            if (closed) return false;
            items.push(item);
            start();
            return true;
        },
        pending: () => items.length - cursor,
        busy: () => running !== null,
        drain,
        close: async () => {
            closed = true;
            await drain();
        },
    };
};
