// src/simulation/runMatchingSimulation.ts

import { config } from '../config/config';
import { loadSampleDonors, loadSiteGraph } from '../config/dataFiles';
import { logger } from '../config/logger';
import { compatibleDonorTypes } from '../engine/compatibility';
import { createEngineContext, EngineContext, seedDonors } from '../engine/engineContext';
import { DonorRegistration } from '../models/Donor';
import { EmergencySubmission } from '../models/EmergencyTicket';
import { MatchKind } from '../models/MatchRecord';
import { EngineError } from '../utils/errors';

/**
 * Full matching-day simulation
 *
 * Demonstrates:
 * - Donor registration from sample data
 * - Normal matches with shortest-path proximity
 * - Emergency triage ordering (urgency, then arrival)
 * - A consumed-but-unmatched emergency ticket
 * - Live statistics and ledger invariants
 */

export interface SimulationSummary {
    donorsRegistered: number;
    normalMatches: number;
    emergencyMatched: number;
    emergencyUnmatched: number;
    emergencyOrder: number[];  // Urgencies in processing order
    ledgerSize: number;
    invariantsHold: boolean;
}

const NORMAL_REQUESTS = [
    { bloodType: 'O+', site: 'Hospital B' },
    { bloodType: 'AB+', site: 'Hospital D' },
    { bloodType: 'O-', site: 'Hospital C' }
];

const EMERGENCY_REQUESTS: EmergencySubmission[] = [
    { urgency: 3, patient: { bloodType: 'A+', site: 'Hospital A' } },
    { urgency: 1, patient: { bloodType: 'O-', site: 'Hospital B' } },
    { urgency: 3, patient: { bloodType: 'B-', site: 'Hospital D' } },
    { urgency: 2, patient: { bloodType: 'AB-', site: 'Hospital C' } }
];

function logSection(title: string): void {
    logger.info(`==== ${title} ====`);
}

export function runSimulation(
    context: EngineContext,
    donors: DonorRegistration[],
    now: Date
): SimulationSummary {
    // ========== STEP 1: Register donors ==========
    logSection('STEP 1: Registering donors');
    seedDonors(context, donors);

    // ========== STEP 2: Normal matches ==========
    logSection('STEP 2: Normal matches');
    let normalMatches = 0;
    for (const request of NORMAL_REQUESTS) {
        try {
            const { donor, distanceKm } = context.matchingEngine.findBestDonor(request.bloodType, request.site, now);
            normalMatches++;
            logger.info(`  ${request.bloodType} at ${request.site} <- ${donor.name} (${donor.bloodType}, ${distanceKm} km)`);
        } catch (err) {
            if (!(err instanceof EngineError)) {
                throw err;
            }
            logger.warn(`  ${request.bloodType} at ${request.site}: ${err.message}`);
        }
    }

    // ========== STEP 3: Emergency admissions ==========
    logSection('STEP 3: Emergency admissions');
    for (const submission of EMERGENCY_REQUESTS) {
        const { ticket, position } = context.emergencyQueue.submit(submission, now);
        logger.info(`  Ticket #${ticket.sequence} urgency ${ticket.urgency} -> position ${position}`);
    }
    const queued = context.emergencyQueue.peekAll();
    logger.info(`  Queue order: ${queued.map(t => `#${t.sequence}(u${t.urgency})`).join(', ')}`);

    // ========== STEP 4: Emergency processing ==========
    logSection('STEP 4: Emergency processing');
    const emergencyOrder: number[] = [];
    let emergencyMatched = 0;
    let emergencyUnmatched = 0;
    while (context.emergencyQueue.size() > 0) {
        const outcome = context.emergencyQueue.processNext(now);
        emergencyOrder.push(outcome.ticket.urgency);
        if (outcome.matched) {
            emergencyMatched++;
            logger.info(`  #${outcome.ticket.sequence} matched ${outcome.match.donor.name} (${outcome.match.distanceKm} km)`);
        } else {
            emergencyUnmatched++;
            logger.info(`  #${outcome.ticket.sequence} consumed without match: ${outcome.error.message}`);
        }
    }

    // ========== STEP 5: Statistics ==========
    logSection('STEP 5: Statistics');
    for (const row of context.ledger.aggregateStats(context.registry, now)) {
        logger.info(`  ${row.bloodType}: ${row.eligible}/${row.total} eligible`);
    }

    // ========== STEP 6: Invariant verification ==========
    logSection('STEP 6: Invariant verification');
    let invariantsHold = true;
    const history = context.ledger.query();

    // Invariant 1: every match used a compatible donor
    for (const entry of history) {
        if (!compatibleDonorTypes(entry.patient.bloodType).includes(entry.donor.bloodType)) {
            logger.error(`  VIOLATED: ${entry.donor.bloodType} given to ${entry.patient.bloodType}`);
            invariantsHold = false;
        }
    }

    // Invariant 2: one donation counted per ledger entry
    const totalDonations = context.registry.listAll().reduce((sum, d) => sum + d.totalDonations, 0);
    const seededDonations = donors.reduce((sum, d) => sum + (d.totalDonations ?? 0), 0);
    if (totalDonations - seededDonations !== history.length) {
        logger.error(`  VIOLATED: ${totalDonations - seededDonations} donations for ${history.length} matches`);
        invariantsHold = false;
    }

    // Invariant 3: emergencies processed in non-decreasing urgency
    for (let i = 1; i < emergencyOrder.length; i++) {
        if (emergencyOrder[i] < emergencyOrder[i - 1]) {
            logger.error(`  VIOLATED: urgency ${emergencyOrder[i]} processed after ${emergencyOrder[i - 1]}`);
            invariantsHold = false;
        }
    }

    // Invariant 4: ledger kinds add up
    const emergencyEntries = history.filter(entry => entry.kind === MatchKind.EMERGENCY).length;
    if (emergencyEntries !== emergencyMatched || history.length - emergencyEntries !== normalMatches) {
        logger.error('  VIOLATED: ledger kinds do not match processed requests');
        invariantsHold = false;
    }

    logger.info(`All invariants hold: ${invariantsHold ? 'YES' : 'NO'}`);

    return {
        donorsRegistered: context.registry.size(),
        normalMatches,
        emergencyMatched,
        emergencyUnmatched,
        emergencyOrder,
        ledgerSize: context.ledger.size(),
        invariantsHold
    };
}

// Run simulation
if (require.main === module) {
    const context = createEngineContext(loadSiteGraph(config.siteGraphPath));
    runSimulation(context, loadSampleDonors(config.seed.path), new Date());
}
