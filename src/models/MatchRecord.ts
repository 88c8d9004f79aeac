// src/models/MatchRecord.ts

import { BloodType } from './BloodType';
import { DonorSnapshot } from './Donor';
import { PatientQuery } from './EmergencyTicket';

export enum MatchKind {
    NORMAL = 'Normal',
    EMERGENCY = 'Emergency'
}

/**
 * Match record - one completed donor/patient match
 *
 * Immutable once appended to the ledger.
 */
export interface MatchRecord {
    readonly timestamp: Date;
    readonly kind: MatchKind;
    readonly urgency: number | null;  // Emergency matches only
    readonly patient: Readonly<PatientQuery>;
    readonly donor: Readonly<DonorSnapshot>;
    readonly distanceKm: number;
}

/**
 * Ledger entry as returned to readers, with a per-query display id
 */
export interface MatchHistoryEntry extends MatchRecord {
    matchId: string;
}

export interface BloodTypeStats {
    bloodType: BloodType;
    total: number;
    eligible: number;
}
