/**
 * EmergencyQueue — Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MatchKind } from '../../models/MatchRecord';
import {
    InvalidBloodTypeError,
    InvalidSiteError,
    InvalidUrgencyError,
    NoCompatibleDonorsError,
    QueueEmptyError
} from '../../utils/errors';
import { daysAgo, newContext, NOW } from './helpers';

const PATIENT = { bloodType: 'AB+', site: 'Hospital B' };

describe('EmergencyQueue.submit', () => {
    it('rejects urgencies outside 1..5 or non-integers', () => {
        const { emergencyQueue } = newContext();
        for (const urgency of [0, 6, -1, 2.5, Number.NaN]) {
            assert.throws(() => emergencyQueue.submit({ urgency, patient: PATIENT }, NOW), InvalidUrgencyError, String(urgency));
        }
        assert.equal(emergencyQueue.size(), 0);
    });

    it('rejects an invalid patient', () => {
        const { emergencyQueue } = newContext();
        assert.throws(
            () => emergencyQueue.submit({ urgency: 1, patient: { bloodType: 'ZZ', site: 'Hospital B' } }, NOW),
            InvalidBloodTypeError
        );
        assert.throws(
            () => emergencyQueue.submit({ urgency: 1, patient: { bloodType: 'A+', site: 'Nowhere' } }, NOW),
            InvalidSiteError
        );
        assert.equal(emergencyQueue.size(), 0);
    });

    it('assigns increasing sequence numbers and reports position', () => {
        const { emergencyQueue } = newContext();

        const a = emergencyQueue.submit({ urgency: 3, patient: PATIENT }, NOW);
        const b = emergencyQueue.submit({ urgency: 1, patient: PATIENT }, NOW);
        const c = emergencyQueue.submit({ urgency: 3, patient: PATIENT }, NOW);

        assert.deepEqual([a.ticket.sequence, b.ticket.sequence, c.ticket.sequence], [1, 2, 3]);
        assert.deepEqual([a.position, b.position, c.position], [1, 1, 3]);
        assert.deepEqual(c.ticket.patient, { bloodType: 'AB+', site: 'Hospital B' });
    });

    it('places a new ticket behind every more urgent or earlier equal ticket', () => {
        const { emergencyQueue } = newContext();
        for (const urgency of [2, 4, 1, 2, 5]) {
            emergencyQueue.submit({ urgency, patient: PATIENT }, NOW);
        }

        const receipt = emergencyQueue.submit({ urgency: 2, patient: PATIENT }, NOW);

        assert.equal(receipt.position, 4);
        assert.equal(emergencyQueue.peekAll().findIndex(t => t.id === receipt.ticket.id), 3);
    });
});

describe('EmergencyQueue ordering', () => {
    it('dequeues urgencies (3,1,3,2) as 1,2,3,3 with FIFO among equals', () => {
        const { emergencyQueue } = newContext();
        const submitted = [3, 1, 3, 2].map(urgency => emergencyQueue.submit({ urgency, patient: PATIENT }, NOW).ticket);

        const processed = [1, 2, 3, 4].map(() => emergencyQueue.processNext(NOW).ticket);

        assert.deepEqual(processed.map(t => t.urgency), [1, 2, 3, 3]);
        assert.deepEqual(processed.map(t => t.id), [submitted[1].id, submitted[3].id, submitted[0].id, submitted[2].id]);
    });

    it('peekAll returns the queue in priority order without changing it', () => {
        const { emergencyQueue } = newContext();
        [4, 2, 5, 2, 1].forEach(urgency => emergencyQueue.submit({ urgency, patient: PATIENT }, NOW));

        const first = emergencyQueue.peekAll();
        const second = emergencyQueue.peekAll();

        assert.deepEqual(first.map(t => [t.urgency, t.sequence]), [[1, 5], [2, 2], [2, 4], [4, 1], [5, 3]]);
        assert.deepEqual(second, first);
        assert.equal(emergencyQueue.size(), 5);
    });

    it('holds M - K tickets after M submissions and K dequeues', () => {
        const { emergencyQueue } = newContext();
        [2, 2, 1, 5, 3, 4].forEach(urgency => emergencyQueue.submit({ urgency, patient: PATIENT }, NOW));
        emergencyQueue.processNext(NOW);
        emergencyQueue.processNext(NOW);

        const remaining = emergencyQueue.peekAll();
        assert.equal(remaining.length, 4);
        assert.deepEqual(remaining.map(t => t.urgency), [2, 3, 4, 5]);
    });

    it('does not reuse sequence numbers after dequeues', () => {
        const { emergencyQueue } = newContext();
        emergencyQueue.submit({ urgency: 1, patient: PATIENT }, NOW);
        emergencyQueue.processNext(NOW);

        const next = emergencyQueue.submit({ urgency: 1, patient: PATIENT }, NOW);
        assert.equal(next.ticket.sequence, 2);
    });
});

describe('EmergencyQueue.processNext', () => {
    it('fails with QueueEmpty on an empty queue and stays at zero', () => {
        const { emergencyQueue } = newContext();
        assert.throws(() => emergencyQueue.processNext(NOW), QueueEmptyError);
        assert.throws(() => emergencyQueue.processNext(NOW), QueueEmptyError);
        assert.equal(emergencyQueue.size(), 0);
    });

    it('matches and records an emergency with its urgency', () => {
        const context = newContext();
        const donor = context.registry.register({ name: 'Responder', bloodType: 'O-', site: 'Hospital D', lastDonationDate: daysAgo(120) });
        context.emergencyQueue.submit({ urgency: 2, patient: PATIENT }, NOW);

        const outcome = context.emergencyQueue.processNext(NOW);

        assert.equal(outcome.matched, true);
        if (outcome.matched) {
            assert.equal(outcome.match.donor.id, donor.id);
            assert.equal(outcome.match.distanceKm, 10);
            assert.equal(outcome.match.record.kind, MatchKind.EMERGENCY);
            assert.equal(outcome.match.record.urgency, 2);
        }
        assert.equal(context.ledger.size(), 1);
    });

    it('consumes an unmatchable ticket and moves on', () => {
        const context = newContext();
        const donor = context.registry.register({ name: 'Only', bloodType: 'AB+', site: 'Hospital A', lastDonationDate: daysAgo(120) });
        context.emergencyQueue.submit({ urgency: 1, patient: { bloodType: 'O-', site: 'Hospital A' } }, NOW);
        context.emergencyQueue.submit({ urgency: 2, patient: PATIENT }, NOW);

        const first = context.emergencyQueue.processNext(NOW);
        assert.equal(first.matched, false);
        if (!first.matched) {
            assert.ok(first.error instanceof NoCompatibleDonorsError);
            assert.equal(first.ticket.urgency, 1);
        }
        assert.equal(context.emergencyQueue.size(), 1);

        const second = context.emergencyQueue.processNext(NOW);
        assert.equal(second.matched, true);
        if (second.matched) {
            assert.equal(second.match.donor.id, donor.id);
        }
        assert.equal(context.emergencyQueue.size(), 0);
        assert.equal(context.ledger.size(), 1);
    });

    it('never gives one donor to two emergencies', () => {
        const context = newContext();
        context.registry.register({ name: 'Single', bloodType: 'O-', site: 'Hospital C', lastDonationDate: daysAgo(365) });
        context.emergencyQueue.submit({ urgency: 1, patient: PATIENT }, NOW);
        context.emergencyQueue.submit({ urgency: 1, patient: PATIENT }, NOW);

        const outcomes = [context.emergencyQueue.processNext(NOW), context.emergencyQueue.processNext(NOW)];

        assert.deepEqual(outcomes.map(o => o.matched), [true, false]);
        assert.equal(context.registry.listByType('O-')[0].totalDonations, 1);
    });
});
