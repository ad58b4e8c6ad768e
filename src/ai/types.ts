/**
 * Address Correction Types
 */

import type { RISK_LEVELS } from '../constants';
import type { AddressRecord } from '../parser/types';

export type RiskLevel = typeof RISK_LEVELS[number];

// Fields a correction may touch. Names, service and weight are never changed.
export const CORRECTABLE_FIELDS = [
    'address_line_1',
    'address_line_2',
    'town_city',
    'county',
    'postcode',
    'country',
] as const;

export type CorrectableField = typeof CORRECTABLE_FIELDS[number];

export interface Suggestion {
    field: CorrectableField;
    original: string;
    proposed_value: string;
    confidence: number;
    risk: RiskLevel;
    reason: string;
}

/**
 * Something that can propose corrections for a record. Implementations throw
 * AIUnavailableError (or AITimeoutError) when they cannot answer.
 */
export interface CorrectorInstance {
    readonly enabled: boolean;
    suggest(record: AddressRecord): Promise<Suggestion[]>;
}

export interface CorrectorConfig {
    apiKey?: string;
    model?: string;
    timeoutMs?: number;
    /** Leave the recipient name out of what is sent to the model. */
    redactNames?: boolean;
}

export interface AppliedCorrections {
    record: AddressRecord;
    applied: Suggestion[];
    flagged: Suggestion[];
}
