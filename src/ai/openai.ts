/**
 * OpenAI Address Corrector
 *
 * Asks a chat model for field-level corrections to one record at a time and
 * validates the JSON it returns. The model only ever sees address fields, and
 * the name too unless names are redacted.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { z } from 'zod';
import * as Logging from '../logging';
import { AI_TIMEOUT_MS, DEFAULT_AI_MODEL } from '../constants';
import { AITimeoutError, AIUnavailableError, errorMessage } from '../errors';
import type { AddressRecord } from '../parser/types';
import { parseRiskLevel } from './risk';
import { CORRECTABLE_FIELDS } from './types';
import type { CorrectableField, CorrectorConfig, CorrectorInstance, RiskLevel, Suggestion } from './types';

const SYSTEM_PROMPT = [
    'You are an address correction assistant for UK courier labels.',
    'Do NOT invent missing fields. Only suggest changes when you are highly confident.',
    'Allowed fields: ' + CORRECTABLE_FIELDS.join(', ') + '.',
    'Respond with STRICT JSON only, no prose, in this shape:',
    '{"suggestions":[{"field":"country","suggested":"UNITED KINGDOM","reason":"typo fix","confidence":0.92,"risk":"low"}],"overall_risk":"low|medium|high"}',
].join('\n');

const ResponseSchema = z.object({
    suggestions: z.array(z.object({
        field: z.string(),
        suggested: z.union([z.string(), z.number()]).transform(value => String(value).trim()),
        reason: z.string().optional(),
        confidence: z.coerce.number().optional(),
        risk: z.string().optional(),
    })).default([]),
    overall_risk: z.string().optional(),
});

const isCorrectableField = (value: string): value is CorrectableField =>
    CORRECTABLE_FIELDS.some(field => field === value);

export const buildPayload = (record: AddressRecord, redactNames: boolean): Record<string, string> => {
    const payload: Record<string, string> = {};
    if (!redactNames) {
        payload.full_name = record.full_name;
    }
    for (const field of CORRECTABLE_FIELDS) {
        payload[field] = record[field];
    }
    return payload;
};

/** Pulls the JSON object out of a reply that may be fenced or wrapped in prose. */
export const extractJson = (text: string): string => {
    let stripped = text.trim();
    if (stripped.startsWith('```')) {
        stripped = stripped.replace(/^```[\w-]*\n?/, '').replace(/```/g, '').trim();
    }
    if (stripped.startsWith('{') && stripped.endsWith('}')) {
        return stripped;
    }
    const found = /\{[\s\S]*\}/.exec(stripped);
    if (!found) {
        throw new Error('No JSON object found in model output');
    }
    return found[0];
};

export const parseSuggestions = (content: string, record: AddressRecord): Suggestion[] => {
    const parsed = ResponseSchema.parse(JSON.parse(extractJson(content)));
    const overall: RiskLevel = parseRiskLevel(parsed.overall_risk) ?? 'high';

    const suggestions: Suggestion[] = [];
    for (const item of parsed.suggestions) {
        const field = item.field.trim();
        if (!isCorrectableField(field) || !item.suggested) continue;
        suggestions.push({
            field,
            original: record[field],
            proposed_value: item.suggested,
            confidence: item.confidence ?? 0,
            risk: parseRiskLevel(item.risk) ?? overall,
            reason: item.reason?.trim() || 'unspecified',
        });
    }
    return suggestions;
};

export const create = (config: CorrectorConfig): CorrectorInstance => {
    const logger = Logging.getLogger();
    const model = config.model || DEFAULT_AI_MODEL;
    const timeoutMs = config.timeoutMs ?? AI_TIMEOUT_MS;

    if (!config.apiKey) {
        throw new AIUnavailableError('OPENAI_API_KEY environment variable is not set');
    }
    const client = new OpenAI({ apiKey: config.apiKey, timeout: timeoutMs, maxRetries: 1 });

    const suggest = async (record: AddressRecord): Promise<Suggestion[]> => {
        const messages: ChatCompletionMessageParam[] = [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: `Record:\n${JSON.stringify(buildPayload(record, config.redactNames ?? false), null, 2)}` },
        ];

        const startTime = Date.now();
        let content: string | null | undefined;
        try {
            const completion = await client.chat.completions.create({
                model,
                messages,
                response_format: { type: 'json_object' },
                temperature: 0,
            });
            content = completion.choices[0]?.message?.content;
        } catch (error) {
            if (error instanceof OpenAI.APIConnectionTimeoutError) {
                throw new AITimeoutError(`Model did not answer within ${timeoutMs}ms`, { cause: error });
            }
            throw new AIUnavailableError(`Failed to create completion: ${errorMessage(error)}`, { cause: error });
        }
        logger.debug('Correction model responded in %dms', Date.now() - startTime);

        if (!content) {
            throw new AIUnavailableError('No response received from the correction model');
        }
        try {
            return parseSuggestions(content, record);
        } catch (error) {
            // Parser messages quote the reply, which may hold address text
            const kind = error instanceof Error ? error.name : 'Error';
            throw new AIUnavailableError(`Model output was not usable: ${kind} in a ${content.length} character reply`, { cause: error });
        }
    };

    return { enabled: true, suggest };
};
