import type { CorrectorInstance } from './types';

/** Used when corrections are switched off; never proposes anything. */
export const create = (): CorrectorInstance => ({
    enabled: false,
    suggest: async () => [],
});
