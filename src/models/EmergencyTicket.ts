// src/models/EmergencyTicket.ts

import { BloodType } from './BloodType';

/**
 * Patient side of a match request. Never stored on its own.
 */
export interface PatientQuery {
    bloodType: BloodType;
    site: string;
}

export const MIN_URGENCY = 1;  // Most urgent
export const MAX_URGENCY = 5;

/**
 * Emergency ticket - one admission waiting in the emergency queue
 *
 * Ordering: urgency ascending, then sequence ascending.
 * Sequence numbers are assigned by the queue and never reused.
 */
export interface EmergencyTicket {
    id: string;
    urgency: number;
    sequence: number;
    patient: PatientQuery;
    submittedAt: Date;
}

/**
 * Submission input before validation
 */
export interface EmergencySubmission {
    urgency: number;
    patient: {
        bloodType: string;
        site: string;
    };
}
