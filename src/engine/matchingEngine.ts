// src/engine/matchingEngine.ts

import { Donor } from '../models/Donor';
import { PatientQuery } from '../models/EmergencyTicket';
import { MatchKind, MatchRecord } from '../models/MatchRecord';
import { logger } from '../config/logger';
import { InvalidSiteError, NoCompatibleDonorsError, NoEligibleDonorsError } from '../utils/errors';
import { compatibleDonorTypes, parseBloodType } from './compatibility';
import { DistanceGraph, UNREACHABLE } from './distanceGraph';
import { DonorRegistry } from './donorRegistry';
import { MatchLedger } from './matchLedger';

/**
 * How the match was requested; recorded on the ledger entry
 */
export interface MatchContext {
    kind: MatchKind;
    urgency: number | null;
}

export interface MatchResult {
    donor: Donor;
    distanceKm: number;
    record: MatchRecord;
}

const NORMAL_MATCH: MatchContext = { kind: MatchKind.NORMAL, urgency: null };

/**
 * Core matching engine - picks the nearest eligible compatible donor
 *
 * A successful match mutates the donor and appends the ledger record
 * together; nothing that can fail runs between the two.
 */
export class MatchingEngine {
    constructor(
        private readonly registry: DonorRegistry,
        private readonly graph: DistanceGraph,
        private readonly ledger: MatchLedger
    ) {}

    /**
     * Validate a patient query
     *
     * @throws InvalidBloodTypeError, InvalidSiteError
     */
    resolvePatient(bloodType: string, site: string): PatientQuery {
        const patientType = parseBloodType(bloodType);
        const patientSite = site.trim();
        if (!this.graph.hasSite(patientSite)) {
            throw new InvalidSiteError(site);
        }
        return { bloodType: patientType, site: patientSite };
    }

    /**
     * Find, claim and record the best donor for a patient
     *
     * Steps:
     * 1. Collect donors of every compatible type
     * 2. Drop donors still in cooldown
     * 3. Pick the nearest by shortest path; earliest registration wins ties
     * 4. Mark the donor as donated and append the match record
     *
     * @throws InvalidBloodTypeError, InvalidSiteError, NoCompatibleDonorsError, NoEligibleDonorsError
     */
    findBestDonor(
        patientType: string,
        patientSite: string,
        now: Date,
        context: MatchContext = NORMAL_MATCH
    ): MatchResult {
        const patient = this.resolvePatient(patientType, patientSite);

        // Step 1: union of compatible donors
        const candidates: Donor[] = [];
        for (const type of compatibleDonorTypes(patient.bloodType)) {
            candidates.push(...this.registry.listByType(type));
        }
        if (candidates.length === 0) {
            throw new NoCompatibleDonorsError(patient.bloodType);
        }

        // Step 2: eligibility
        const eligible = candidates.filter(donor => this.registry.isEligible(donor, now));
        if (eligible.length === 0) {
            throw new NoEligibleDonorsError(patient.bloodType);
        }

        // Step 3: nearest reachable donor
        let best: Donor | null = null;
        let bestDistance = UNREACHABLE;
        let bestOrder = Number.MAX_SAFE_INTEGER;

        for (const donor of eligible) {
            const distance = this.graph.shortestDistance(patient.site, donor.site);
            if (distance === UNREACHABLE) {
                continue;
            }
            const order = this.registry.registrationOrder(donor.id);
            if (distance < bestDistance || (distance === bestDistance && order < bestOrder)) {
                best = donor;
                bestDistance = distance;
                bestOrder = order;
            }
        }

        if (!best) {
            throw new NoEligibleDonorsError(patient.bloodType);
        }

        // Step 4: claim and record as one unit
        const record: MatchRecord = {
            timestamp: new Date(now),
            kind: context.kind,
            urgency: context.urgency,
            patient,
            donor: {
                id: best.id,
                name: best.name,
                bloodType: best.bloodType,
                site: best.site
            },
            distanceKm: bestDistance
        };
        const donor = this.registry.markDonated(best.id, now);
        this.ledger.record(record);

        logger.info('Donor matched', {
            kind: context.kind,
            urgency: context.urgency,
            patientType: patient.bloodType,
            patientSite: patient.site,
            donorId: donor.id,
            donorType: donor.bloodType,
            distanceKm: bestDistance
        });

        return { donor, distanceKm: bestDistance, record };
    }
}
