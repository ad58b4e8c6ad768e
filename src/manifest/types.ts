/**
 * Manifest Types
 *
 * A manifest describes a batch by reference: file names, counts and hashes.
 * It never holds a value from an address record.
 */

import type { BATCH_SOURCES } from '../constants';
import type { RiskLevel } from '../ai/types';

export type BatchSource = typeof BATCH_SOURCES[number];

export interface AiSummary {
    enabled: boolean;
    max_risk: RiskLevel;
    calls: number;
    applied: number;
    flagged: number;
    unavailable: number;
    skipped_over_budget: number;
}

export interface DefaultsUsed {
    service: string;
    weight_kg: number;
    country: string;
    reference_prefix: string | null;
}

export interface Manifest {
    manifest_version: string;
    batch_id: string;
    timestamp: string;
    client_id: string;
    source: BatchSource;
    input_files: string[];
    input_text_sha256: string;
    output_xlsx: string;
    tracking_csv: string;
    record_count: number;
    parse_warning_count: number;
    validation_failure_count: number;
    defaults_used: DefaultsUsed;
    services_used: Record<string, number>;
    ai_corrections: AiSummary;
}

export interface ManifestInput {
    batchId: string;
    clientId: string;
    source: BatchSource;
    inputFiles: readonly string[];
    rawText: string;
    outputXlsx: string;
    trackingCsv: string;
    recordCount: number;
    parseWarningCount: number;
    validationFailureCount: number;
    defaultsUsed: DefaultsUsed;
    servicesUsed: Record<string, number>;
    aiSummary: AiSummary;
    timestamp?: Date;
}
