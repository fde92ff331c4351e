/**
 * AdmissionControl - Run-wide and per-source caps on how many items a batch
 * may attempt. Counts only; there is no time window.
 */

import { logger } from '../../utils/logger';
import { SkipReason, SourceId } from './types';

export type AdmissionDecision =
    | { admitted: true }
    | { admitted: false; reason: Exclude<SkipReason, 'unsupported'> };

export interface AdmissionLimits {
    globalLimit?: number;
    perSourceLimit?: number;
}

export class AdmissionControl {
    private readonly sourceCounts = new Map<SourceId, number>();
    private globalCount = 0;
    private readonly limits: AdmissionLimits;

    constructor(limits: AdmissionLimits = {}) {
        for (const [name, value] of Object.entries(limits)) {
            if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
                throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
            }
        }
        this.limits = { ...limits };
    }

    /**
     * Check both limits and charge them if the item gets in.
     * The global limit is checked first; a rejected item charges nothing.
     */
    consume(sourceId: SourceId): AdmissionDecision {
        const { globalLimit, perSourceLimit } = this.limits;

        if (globalLimit !== undefined && this.globalCount >= globalLimit) {
            return { admitted: false, reason: 'global-limit' };
        }

        const used = this.sourceCounts.get(sourceId) ?? 0;
        if (perSourceLimit !== undefined && used >= perSourceLimit) {
            return { admitted: false, reason: 'per-source-limit' };
        }

        this.sourceCounts.set(sourceId, used + 1);
        this.globalCount++;

        logger.debug('Admission recorded', { sourceId, count: used + 1, global: this.globalCount });
        return { admitted: true };
    }

    /**
     * Get current stats
     */
    getStats(): { attempted: number; perSource: Partial<Record<SourceId, number>> } {
        const perSource: Partial<Record<SourceId, number>> = {};
        for (const [sourceId, count] of this.sourceCounts) {
            perSource[sourceId] = count;
        }
        return { attempted: this.globalCount, perSource };
    }
}
