/**
 * Config Validation
 *
 * Collects every violation in the document before failing, so an operator can
 * fix a broken config in one pass.
 */

import { z } from 'zod';
import { CLIENT_ID_PATTERN } from '../constants';
import { ConfigValidationError } from '../errors';
import { ClientEntrySchema } from './types';
import type { ClientConfig, ClientConfigSet, ConfigDocument } from './types';

const TriggerTypeProbe = z.object({ trigger: z.object({ type: z.string() }) });

const formatIssue = (clientId: string, issue: z.ZodIssue): string => {
    const location = issue.path.length > 0 ? issue.path.join('.') : 'entry';
    if (issue.code === 'invalid_type' && issue.received === 'undefined') {
        return `${clientId}: ${location} is missing`;
    }
    return `${clientId}: ${location}: ${issue.message}`;
};

const countDefaultRules = (services: unknown): number => {
    if (!Array.isArray(services)) return 0;
    return services.filter(service => {
        const probe = TriggerTypeProbe.safeParse(service);
        return probe.success && probe.data.trigger.type === 'default';
    }).length;
};

export const collectViolations = (document: ConfigDocument): string[] => {
    const violations: string[] = [];
    const clientIds = Object.keys(document);

    if (clientIds.length === 0) {
        violations.push('No clients are configured');
    }

    for (const clientId of clientIds) {
        if (!CLIENT_ID_PATTERN.test(clientId)) {
            violations.push(`${clientId}: invalid client ID format (expected client_NN)`);
        }

        const entry = document[clientId];
        const result = ClientEntrySchema.safeParse(entry);
        if (!result.success) {
            for (const issue of result.error.issues) {
                violations.push(formatIssue(clientId, issue));
            }
        }

        const services = typeof entry === 'object' && entry !== null && 'services' in entry
            ? entry.services
            : undefined;
        if (Array.isArray(services)) {
            const defaults = countDefaultRules(services);
            if (defaults === 0) {
                violations.push(`${clientId}: services need exactly one default rule, found none`);
            } else if (defaults > 1) {
                violations.push(`${clientId}: services need exactly one default rule, found ${defaults}`);
            }
        }
    }

    return violations;
};

/**
 * Validates the document and returns it as a typed snapshot, or throws a
 * ConfigValidationError listing every problem.
 */
export const validate = (
    document: ConfigDocument,
    snapshot: { version?: number; source?: string } = {}
): ClientConfigSet => {
    const violations = collectViolations(document);
    if (violations.length > 0) {
        throw new ConfigValidationError(violations);
    }

    const clients: Record<string, ClientConfig> = {};
    for (const [clientId, entry] of Object.entries(document)) {
        const parsed = ClientEntrySchema.parse(entry);
        clients[clientId] = Object.freeze({ client_id: clientId, ...parsed });
    }

    return Object.freeze({
        version: snapshot.version ?? 1,
        source: snapshot.source ?? '<inline>',
        loadedAt: new Date(),
        clients: Object.freeze(clients),
    });
};
