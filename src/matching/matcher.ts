/**
 * Service Matcher
 *
 * Chooses the shipping service for a block of text. Tag rules are tried in
 * configured order and the first one whose tag is present wins; otherwise the
 * client's default rule applies.
 *
 * A tag counts as present (case-insensitive) when:
 *   1. the first non-empty line is exactly the tag,
 *   2. a `SERVICE=<tag>` directive names it, or
 *   3. it appears as a token, i.e. not touching a letter, digit or underscore
 *      on either side. `[T48]`, `(T48)` and `T48,` match; `XT48`, `T480` and
 *      `T48_A` do not.
 */

import type { ServiceRule } from '../config/types';
import type { MatchResult, MatchVia } from './types';

const DIRECTIVE_PATTERN = /\bSERVICE\s*=\s*([^\s,;\])]+)/gi;
const BRACKETED_LINE_PATTERN = /^[[(]\s*([^\])]+?)\s*[\])]$/;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const tokenPattern = (tag: string): RegExp =>
    new RegExp(`(?<![A-Za-z0-9_])${escapeRegExp(tag)}(?![A-Za-z0-9_])`, 'i');

const firstNonEmptyLine = (text: string): string | undefined =>
    text.split(/\r?\n/).map(line => line.trim()).find(line => line.length > 0);

const directiveValues = (text: string): string[] =>
    Array.from(text.matchAll(DIRECTIVE_PATTERN), m => m[1].toUpperCase());

const tagOf = (rule: ServiceRule): string | null =>
    rule.trigger.type === 'tag' ? rule.trigger.tag.trim() : null;

export const findDefaultRule = (rules: readonly ServiceRule[]): ServiceRule | undefined =>
    rules.find(rule => rule.trigger.type === 'default');

export const findTag = (text: string, tag: string): MatchVia | null => {
    const wanted = tag.trim().toUpperCase();
    if (!wanted) return null;

    if (firstNonEmptyLine(text)?.toUpperCase() === wanted) return 'first_line';
    if (directiveValues(text).includes(wanted)) return 'directive';
    if (tokenPattern(wanted).test(text)) return 'token';
    return null;
};

export const explain = (text: string, rules: readonly ServiceRule[]): MatchResult => {
    for (const rule of rules) {
        const tag = tagOf(rule);
        if (tag === null) continue;
        const via = findTag(text, tag);
        if (via) {
            return { rule, tag, via };
        }
    }

    const fallback = findDefaultRule(rules);
    if (!fallback) {
        throw new Error('No default service rule configured');
    }
    return { rule: fallback, tag: null, via: 'default' };
};

export const match = (text: string, rules: readonly ServiceRule[]): ServiceRule =>
    explain(text, rules).rule;

/** The value written to the service column: the rule's code, else its name. */
export const serviceValue = (rule: ServiceRule): string => rule.code || rule.name;

/**
 * True for lines that only carry service instructions (`SERVICE=T48`, `[T48]`,
 * or a bare configured tag) and so are not part of the address.
 */
export const isDirectiveLine = (line: string, tags: readonly string[]): boolean => {
    const trimmed = line.trim();
    if (!trimmed) return false;
    if (/^SERVICE\s*=\s*\S+$/i.test(trimmed)) return true;

    const upperTags = tags.map(tag => tag.trim().toUpperCase()).filter(Boolean);
    const bracketed = BRACKETED_LINE_PATTERN.exec(trimmed);
    const bare = (bracketed ? bracketed[1] : trimmed).toUpperCase();
    return upperTags.includes(bare);
};
