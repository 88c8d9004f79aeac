// src/engine/matchLedger.ts

import { v4 as uuidv4 } from 'uuid';
import { BLOOD_TYPES } from '../models/BloodType';
import { BloodTypeStats, MatchHistoryEntry, MatchRecord } from '../models/MatchRecord';
import { DonorRegistry } from './donorRegistry';

/**
 * Append-only history of completed matches
 */
export class MatchLedger {
    private entries: MatchRecord[] = [];

    record(entry: MatchRecord): void {
        this.entries.push(Object.freeze({
            ...entry,
            timestamp: new Date(entry.timestamp),
            patient: Object.freeze({ ...entry.patient }),
            donor: Object.freeze({ ...entry.donor })
        }));
    }

    /**
     * All matches, most recent first
     *
     * matchId is for display only and changes between calls. Timestamps
     * are copied out; freezing does not cover a Date.
     */
    query(): MatchHistoryEntry[] {
        const history: MatchHistoryEntry[] = [];
        for (let i = this.entries.length - 1; i >= 0; i--) {
            const entry = this.entries[i];
            history.push({ matchId: uuidv4(), ...entry, timestamp: new Date(entry.timestamp) });
        }
        return history;
    }

    size(): number {
        return this.entries.length;
    }

    /**
     * Per-type donor totals and currently eligible counts, in table order
     *
     * Recomputed from the registry on every call.
     */
    aggregateStats(registry: DonorRegistry, now: Date): BloodTypeStats[] {
        return BLOOD_TYPES.map(bloodType => {
            const donors = registry.listByType(bloodType);
            return {
                bloodType,
                total: donors.length,
                eligible: donors.filter(donor => registry.isEligible(donor, now)).length
            };
        });
    }
}
