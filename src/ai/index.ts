import * as Logging from '../logging';
import * as OpenAICorrector from './openai';
import * as NoopCorrector from './noop';
import type { CorrectorConfig, CorrectorInstance } from './types';

export { applySuggestions, isWithinRisk, parseRiskLevel, riskRank } from './risk';
export { needsReview, reviewReasons } from './triage';
export { buildPayload, extractJson, parseSuggestions } from './openai';

// Re-export types
export * from './types';

/**
 * Returns the OpenAI corrector when corrections are enabled and a key is
 * available, and the no-op corrector otherwise.
 */
export const create = (config: CorrectorConfig & { enabled: boolean }): CorrectorInstance => {
    if (!config.enabled) {
        return NoopCorrector.create();
    }
    if (!config.apiKey) {
        Logging.getLogger().warn('AI corrections requested but OPENAI_API_KEY is not set; continuing without them');
        return NoopCorrector.create();
    }
    return OpenAICorrector.create(config);
};
