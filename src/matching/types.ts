import type { ServiceRule } from '../config/types';

export type MatchVia = 'first_line' | 'directive' | 'token' | 'default';

export interface MatchResult {
    rule: ServiceRule;
    tag: string | null;
    via: MatchVia;
}
