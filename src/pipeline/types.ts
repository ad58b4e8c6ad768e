/**
 * Pipeline Types
 */

import type { EffectiveSettings } from '../config/types';
import type { CorrectorInstance, RiskLevel, Suggestion } from '../ai/types';
import type { AiSummary, BatchSource } from '../manifest/types';
import type { OutputInstance } from '../output';
import type { ParseWarning } from '../parser/types';

export interface ValidationFailure {
    record_index: number;
    missing_fields: string[];
}

export interface FlaggedSuggestion extends Suggestion {
    record_index: number;
}

export interface BatchInput {
    clientId: string;
    settings: EffectiveSettings;
    rawText: string;
    inputFiles: readonly string[];
    useAi: boolean;
    maxRisk: RiskLevel;
    maxAiCalls: number;
    source: BatchSource;
    dryRun: boolean;
}

export interface BatchResult {
    client_id: string;
    batch_id: string;
    /** Records written to the outputs. */
    record_count: number;
    /** Blocks that became records, valid or not. */
    parsed_count: number;
    output_xlsx: string;
    tracking_csv: string;
    manifest_path: string | null;
    manifest_error?: string;
    ai_summary: AiSummary;
    parse_warnings: ParseWarning[];
    validation_failures: ValidationFailure[];
    flagged_suggestions: FlaggedSuggestion[];
    services_used: Record<string, number>;
    dry_run: boolean;
}

export interface PipelineConfig {
    /** Where manifests are written. */
    logDir: string;
    corrector: CorrectorInstance;
    output?: OutputInstance;
    now?: () => Date;
}
