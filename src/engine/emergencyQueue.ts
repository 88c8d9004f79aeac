// src/engine/emergencyQueue.ts

import { v4 as uuidv4 } from 'uuid';
import { EmergencySubmission, EmergencyTicket, MAX_URGENCY, MIN_URGENCY } from '../models/EmergencyTicket';
import { MatchKind } from '../models/MatchRecord';
import { logger } from '../config/logger';
import { InvalidUrgencyError, isNoDonorError, NoCompatibleDonorsError, NoEligibleDonorsError, QueueEmptyError } from '../utils/errors';
import { MatchingEngine, MatchResult } from './matchingEngine';
import { MinHeap } from './minHeap';

/**
 * Outcome of processing one ticket
 *
 * The ticket is consumed either way; an unmatched ticket is handed back
 * with the reason so the caller can escalate.
 */
export type EmergencyOutcome =
    | { matched: true; ticket: EmergencyTicket; match: MatchResult }
    | { matched: false; ticket: EmergencyTicket; error: NoCompatibleDonorsError | NoEligibleDonorsError };

export interface SubmissionReceipt {
    ticket: EmergencyTicket;
    position: number;  // 1-based, in processing order
}

/**
 * Urgency first (1 = most urgent), then arrival order
 */
function compareTickets(a: EmergencyTicket, b: EmergencyTicket): number {
    if (a.urgency !== b.urgency) {
        return a.urgency - b.urgency;
    }
    return a.sequence - b.sequence;
}

function copyTicket(ticket: EmergencyTicket): EmergencyTicket {
    return { ...ticket, patient: { ...ticket.patient }, submittedAt: new Date(ticket.submittedAt) };
}

/**
 * Emergency queue - urgency-ordered admission feeding the matching engine
 *
 * Backed by a binary min-heap keyed by (urgency, sequence). Sequence
 * numbers only ever grow, so equal urgencies dequeue FIFO.
 */
export class EmergencyQueue {
    private heap: MinHeap<EmergencyTicket>;
    private nextSequence: number;

    constructor(private readonly matchingEngine: MatchingEngine) {
        this.heap = new MinHeap(compareTickets);
        this.nextSequence = 1;
    }

    /**
     * Admit a ticket
     *
     * @throws InvalidUrgencyError, InvalidBloodTypeError, InvalidSiteError
     */
    submit(submission: EmergencySubmission, now: Date): SubmissionReceipt {
        const { urgency } = submission;
        if (!Number.isInteger(urgency) || urgency < MIN_URGENCY || urgency > MAX_URGENCY) {
            throw new InvalidUrgencyError(urgency);
        }

        const patient = this.matchingEngine.resolvePatient(
            submission.patient.bloodType,
            submission.patient.site
        );

        const ticket: EmergencyTicket = {
            id: uuidv4(),
            urgency,
            sequence: this.nextSequence++,
            patient,
            submittedAt: new Date(now)
        };
        this.heap.push(ticket);

        const position = this.heap.countWhere(t => compareTickets(t, ticket) < 0) + 1;

        logger.info('Emergency ticket queued', {
            ticketId: ticket.id,
            urgency,
            sequence: ticket.sequence,
            position
        });

        return { ticket: copyTicket(ticket), position };
    }

    /**
     * Remove the most urgent ticket and try to match it
     *
     * Never re-enqueues: a ticket with no available donor is dropped and
     * returned with the failure.
     *
     * @throws QueueEmptyError
     */
    processNext(now: Date): EmergencyOutcome {
        const ticket = this.heap.pop();
        if (!ticket) {
            throw new QueueEmptyError();
        }

        try {
            const match = this.matchingEngine.findBestDonor(
                ticket.patient.bloodType,
                ticket.patient.site,
                now,
                { kind: MatchKind.EMERGENCY, urgency: ticket.urgency }
            );
            return { matched: true, ticket, match };
        } catch (err) {
            if (!isNoDonorError(err)) {
                throw err;
            }
            logger.warn('Emergency ticket consumed without a match', {
                ticketId: ticket.id,
                urgency: ticket.urgency,
                reason: err.code
            });
            return { matched: false, ticket, error: err };
        }
    }

    /**
     * Snapshot of the queue in processing order
     */
    peekAll(): EmergencyTicket[] {
        return this.heap.toSortedArray().map(copyTicket);
    }

    size(): number {
        return this.heap.size;
    }
}
