// src/models/Donor.ts

import { BloodType } from './BloodType';

/**
 * Donor model - one registered blood donor
 *
 * Data only, no methods. Owned by DonorRegistry; mutated only when matched.
 */
export interface Donor {
    id: string;
    name: string;
    bloodType: BloodType;
    site: string;
    lastDonationDate: string;  // ISO-8601 date or date-time
    totalDonations: number;
}

/**
 * Registration input before normalization and validation
 */
export interface DonorRegistration {
    name: string;
    bloodType: string;
    site: string;
    lastDonationDate: string;
    totalDonations?: number;
}

/**
 * Donor fields copied into a match record
 */
export type DonorSnapshot = Pick<Donor, 'id' | 'name' | 'bloodType' | 'site'>;
