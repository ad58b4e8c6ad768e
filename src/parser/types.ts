/**
 * Record Parser Types
 */

import type { ClientDefaults } from '../config/types';

export interface AddressRecord {
    full_name: string;
    address_line_1: string;
    address_line_2: string;
    town_city: string;
    county: string;
    postcode: string;
    country: string;
    service: string;
    weight_kg: number;
    reference?: string;
    phone?: string;
    email?: string;
    notes: string;
}

export type AddressField = keyof Omit<AddressRecord, 'notes'>;

/** A block that could not become a record. Carries no text from the block. */
export interface ParseWarning {
    block_index: number;
    line_count: number;
    reason: string;
}

export interface ParsedBlock {
    /** Position of the block in the input, 0-based, counting every non-empty block. */
    index: number;
    /** The block's raw text, kept for service matching only. */
    text: string;
    record: AddressRecord;
}

export type ParseOutcome =
    | { kind: 'record'; block: ParsedBlock }
    | { kind: 'warning'; warning: ParseWarning };

export interface ParserConfig {
    defaults: ClientDefaults;
    /** Configured service tags; lines consisting only of one are not address lines. */
    serviceTags?: string[];
}
