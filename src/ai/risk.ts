import { RISK_LEVELS } from '../constants';
import { normalizeUkPostcode } from '../parser/postcode';
import type { AddressRecord } from '../parser/types';
import type { AppliedCorrections, RiskLevel, Suggestion } from './types';

export const riskRank = (risk: RiskLevel): number => RISK_LEVELS.indexOf(risk);

export const parseRiskLevel = (value: unknown): RiskLevel | null => {
    if (typeof value !== 'string') return null;
    const wanted = value.trim().toLowerCase();
    return RISK_LEVELS.find(level => level === wanted) ?? null;
};

export const isWithinRisk = (risk: RiskLevel, maxRisk: RiskLevel): boolean =>
    riskRank(risk) <= riskRank(maxRisk);

const formatValue = (suggestion: Suggestion): string => {
    const value = suggestion.proposed_value.trim();
    if (suggestion.field === 'postcode') return normalizeUkPostcode(value) || value.toUpperCase();
    if (suggestion.field === 'country') return value.toUpperCase();
    return value;
};

/**
 * Applies every suggestion whose risk is at or below `maxRisk`; the rest are
 * returned as flagged for human review. The input record is not modified.
 */
export const applySuggestions = (
    record: AddressRecord,
    suggestions: readonly Suggestion[],
    maxRisk: RiskLevel
): AppliedCorrections => {
    const updated: AddressRecord = { ...record };
    const applied: Suggestion[] = [];
    const flagged: Suggestion[] = [];

    for (const suggestion of suggestions) {
        if (!suggestion.proposed_value.trim() || !isWithinRisk(suggestion.risk, maxRisk)) {
            flagged.push(suggestion);
            continue;
        }
        updated[suggestion.field] = formatValue(suggestion);
        applied.push(suggestion);
    }

    return { record: updated, applied, flagged };
};
