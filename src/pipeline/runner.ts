/**
 * Pipeline Runner
 *
 * Runs one batch: parse, choose services, optionally correct addresses,
 * validate, write the courier outputs and record a manifest. Batches for the
 * same client never overlap; each waits for the previous one to settle.
 */

import * as crypto from 'node:crypto';
import * as AI from '../ai';
import * as Logging from '../logging';
import * as Manifest from '../manifest';
import * as Output from '../output';
import * as Parser from '../parser';
import * as Storage from '../util/storage';
import { DEFAULT_COUNTRY, REQUIRED_RECORD_FIELDS } from '../constants';
import { AIUnavailableError, EmptyBatchError, errorMessage, ManifestWriteError } from '../errors';
import { explain, serviceValue } from '../matching';
import type { AiSummary, DefaultsUsed } from '../manifest/types';
import type { AddressRecord, ParseWarning } from '../parser/types';
import type { AiFlag, TrackedRecord } from '../output/types';
import type {
    BatchInput,
    BatchResult,
    FlaggedSuggestion,
    PipelineConfig,
    ValidationFailure,
} from './types';

export interface PipelineInstance {
    run(input: BatchInput): Promise<BatchResult>;
}

/** Names of required fields that are empty; an empty list means the record can be exported. */
export const validateRecord = (record: AddressRecord): string[] =>
    REQUIRED_RECORD_FIELDS.filter(field => {
        if (field === 'weight_kg') {
            return !Number.isFinite(record.weight_kg) || record.weight_kg <= 0;
        }
        return !record[field].trim();
    });

export const create = (config: PipelineConfig): PipelineInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const output = config.output ?? Output.create();
    const now = config.now ?? (() => new Date());
    const locks = new Map<string, Promise<void>>();

    const withClientLock = async <T>(clientId: string, task: () => Promise<T>): Promise<T> => {
        const previous = locks.get(clientId) ?? Promise.resolve();
        const result = previous.then(task);
        // The chain only orders batches; each caller still sees its own failure
        const tail = result.then(() => undefined, () => undefined);
        locks.set(clientId, tail);
        try {
            return await result;
        } finally {
            if (locks.get(clientId) === tail) {
                locks.delete(clientId);
            }
        }
    };

    const correct = async (
        records: AddressRecord[],
        input: BatchInput
    ): Promise<{ records: AddressRecord[]; flags: AiFlag[]; summary: AiSummary; flagged: FlaggedSuggestion[] }> => {
        const enabled = input.useAi && config.corrector.enabled;
        const summary: AiSummary = {
            enabled,
            max_risk: input.maxRisk,
            calls: 0,
            applied: 0,
            flagged: 0,
            unavailable: 0,
            skipped_over_budget: 0,
        };
        const flags: AiFlag[] = records.map(() => '');
        const flagged: FlaggedSuggestion[] = [];
        if (!enabled) {
            return { records, flags, summary, flagged };
        }

        const corrected: AddressRecord[] = [];
        for (const [index, record] of records.entries()) {
            if (!AI.needsReview(record)) {
                corrected.push(record);
                continue;
            }
            if (summary.calls >= input.maxAiCalls) {
                summary.skipped_over_budget++;
                corrected.push(record);
                continue;
            }

            summary.calls++;
            try {
                const suggestions = await config.corrector.suggest(record);
                const result = AI.applySuggestions(record, suggestions, input.maxRisk);
                summary.applied += result.applied.length;
                summary.flagged += result.flagged.length;
                flagged.push(...result.flagged.map(suggestion => ({ ...suggestion, record_index: index })));
                if (result.flagged.length > 0) {
                    flags[index] = 'review';
                } else if (result.applied.length > 0) {
                    flags[index] = 'applied';
                }
                corrected.push(result.record);
            } catch (error) {
                if (!(error instanceof AIUnavailableError)) {
                    throw error;
                }
                summary.unavailable++;
                logger.warn('Correction skipped for record %d: %s', index, Logging.redact(error.message));
                corrected.push(record);
            }
        }
        return { records: corrected, flags, summary, flagged };
    };

    const runBatch = async (input: BatchInput): Promise<BatchResult> => {
        const { settings } = input;
        const batchId = crypto.randomUUID();
        const startedAt = now();
        logger.info('Batch %s started for %s (%s)', batchId, input.clientId, input.source);

        const serviceTags = settings.services.flatMap(rule => rule.trigger.type === 'tag' ? [rule.trigger.tag] : []);
        const parser = Parser.create({ defaults: settings.defaults, serviceTags });

        const parseWarnings: ParseWarning[] = [];
        const parsed: AddressRecord[] = [];
        for (const outcome of parser.parse(input.rawText)) {
            if (outcome.kind === 'warning') {
                parseWarnings.push(outcome.warning);
                logger.warn('Block %d skipped: %s', outcome.warning.block_index, outcome.warning.reason);
                continue;
            }
            const { block } = outcome;
            const matched = explain(block.text, settings.services);
            const record: AddressRecord = { ...block.record, service: serviceValue(matched.rule) };
            if (matched.tag) {
                record.notes = [record.notes, `Tag matched: ${matched.tag}`].filter(Boolean).join(' ');
            }
            parsed.push(record);
        }

        const corrections = await correct(parsed, input);

        const validationFailures: ValidationFailure[] = [];
        const valid: TrackedRecord[] = [];
        corrections.records.forEach((record, index) => {
            const missing = validateRecord(record);
            if (missing.length > 0) {
                validationFailures.push({ record_index: index, missing_fields: missing });
                logger.warn('Record %d excluded, missing: %s', index, missing.join(', '));
                return;
            }
            valid.push({ record, ai_flag: corrections.flags[index] });
        });

        if (valid.length === 0) {
            throw new EmptyBatchError(
                `No valid records in batch (${parseWarnings.length} parse warning(s), ${validationFailures.length} validation failure(s))`
            );
        }

        const records = valid.map(entry => entry.record);
        const servicesUsed = Manifest.countServices(records.map(record => record.service));
        const baseName = output.baseName(input.clientId, batchId, startedAt);
        const planned = output.planPaths(settings.folders, baseName);

        const result: BatchResult = {
            client_id: input.clientId,
            batch_id: batchId,
            record_count: valid.length,
            parsed_count: parsed.length,
            output_xlsx: planned.xlsx,
            tracking_csv: planned.csv,
            manifest_path: null,
            ai_summary: corrections.summary,
            parse_warnings: parseWarnings,
            validation_failures: validationFailures,
            flagged_suggestions: corrections.flagged,
            services_used: servicesUsed,
            dry_run: input.dryRun,
        };

        if (input.dryRun) {
            logger.info('Dry run for %s: %d record(s) would be written to %s', input.clientId, valid.length, planned.xlsx);
            return result;
        }

        result.output_xlsx = await output.write(
            records,
            settings.template_mapping,
            settings.template_path,
            settings.folders.ready_xlsx,
            baseName
        );
        try {
            result.tracking_csv = await output.writeTracking(valid, settings.folders.tracking_out, baseName);
        } catch (error) {
            // A spreadsheet without its tracking file is not a finished batch
            await storage.deleteFile(result.output_xlsx);
            throw error;
        }

        const defaultsUsed: DefaultsUsed = {
            service: settings.defaults.service,
            weight_kg: settings.defaults.weight_kg,
            country: settings.defaults.country ?? DEFAULT_COUNTRY,
            reference_prefix: settings.defaults.reference_prefix ?? null,
        };
        const manifest = Manifest.build({
            batchId,
            clientId: input.clientId,
            source: input.source,
            inputFiles: input.inputFiles,
            rawText: input.rawText,
            outputXlsx: result.output_xlsx,
            trackingCsv: result.tracking_csv,
            recordCount: result.record_count,
            parseWarningCount: parseWarnings.length,
            validationFailureCount: validationFailures.length,
            defaultsUsed,
            servicesUsed,
            aiSummary: corrections.summary,
            timestamp: startedAt,
        });
        try {
            result.manifest_path = await Manifest.write(manifest, config.logDir);
        } catch (error) {
            if (!(error instanceof ManifestWriteError)) {
                throw error;
            }
            result.manifest_error = errorMessage(error);
            logger.error('Batch %s outputs kept without a manifest: %s', batchId, error.message);
        }

        logger.info('Batch %s finished: %d record(s) written', batchId, result.record_count);
        return result;
    };

    return {
        run: input => withClientLock(input.clientId, () => runBatch(input)),
    };
};
