// src/engine/eligibility.ts

import { differenceInDays, isValid, parseISO } from 'date-fns';
import { Donor } from '../models/Donor';

/**
 * Minimum whole days between donations
 */
export const DONATION_COOLDOWN_DAYS = 90;

/**
 * Check whether a donor's post-donation cooldown has elapsed
 *
 * Pure function. Fails closed: a missing, unparsable or future
 * lastDonationDate makes the donor ineligible rather than throwing.
 * Exactly 90 days counts as eligible.
 */
export function isEligible(donor: Pick<Donor, 'lastDonationDate'>, now: Date): boolean {
    if (typeof donor.lastDonationDate !== 'string' || donor.lastDonationDate.trim() === '') {
        return false;
    }

    const lastDonation = parseISO(donor.lastDonationDate.trim());
    if (!isValid(lastDonation) || !isValid(now)) {
        return false;
    }

    return differenceInDays(now, lastDonation) >= DONATION_COOLDOWN_DAYS;
}
