/**
 * Output Types
 */

import type { AddressRecord } from '../parser/types';

/** Whether a record's address was changed by, or is waiting on, a correction. */
export type AiFlag = '' | 'applied' | 'review';

export interface TrackedRecord {
    record: AddressRecord;
    ai_flag: AiFlag;
}

export interface OutputPaths {
    xlsx: string;
    csv: string;
}

export interface OutputConfig {
    log?: (message: string, ...args: unknown[]) => void;
}
