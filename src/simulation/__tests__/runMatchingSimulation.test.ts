/**
 * Matching simulation — Tests
 *
 * Sample donors all last donated in early 2025, so every one is
 * eligible on the simulated day.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import { parseISO } from 'date-fns';

import { loadSampleDonors } from '../../config/dataFiles';
import { MatchKind } from '../../models/MatchRecord';
import { newContext } from '../../engine/__tests__/helpers';
import { runSimulation } from '../runMatchingSimulation';

const SAMPLE_DONORS = path.resolve(__dirname, '..', '..', '..', 'data', 'sampleDonors.json');

describe('runSimulation', () => {
    it('processes every request and keeps the invariants', () => {
        const context = newContext();
        const summary = runSimulation(context, loadSampleDonors(SAMPLE_DONORS), parseISO('2026-01-01'));

        assert.deepEqual(summary, {
            donorsRegistered: 8,
            normalMatches: 3,
            emergencyMatched: 3,
            emergencyUnmatched: 1,
            emergencyOrder: [1, 2, 3, 3],
            ledgerSize: 6,
            invariantsHold: true
        });
        assert.equal(context.emergencyQueue.size(), 0);
    });

    it('records the expected donors in order', () => {
        const context = newContext();
        runSimulation(context, loadSampleDonors(SAMPLE_DONORS), parseISO('2026-01-01'));

        const history = context.ledger.query().reverse();

        assert.deepEqual(
            history.map(entry => [entry.kind, entry.donor.name, entry.distanceKm]),
            [
                [MatchKind.NORMAL, 'Jane Smith', 0],
                [MatchKind.NORMAL, 'Alice Williams', 0],
                [MatchKind.NORMAL, 'David Miller', 0],
                [MatchKind.EMERGENCY, 'John Doe', 15],
                [MatchKind.EMERGENCY, 'Emma Davis', 8],
                [MatchKind.EMERGENCY, 'Bob Johnson', 23]
            ]
        );
    });
});
