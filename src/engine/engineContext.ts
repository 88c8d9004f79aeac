// src/engine/engineContext.ts

import { Donor, DonorRegistration } from '../models/Donor';
import { SiteGraphConfig } from '../models/Site';
import { logger } from '../config/logger';
import { DistanceGraph } from './distanceGraph';
import { DonorRegistry } from './donorRegistry';
import { EmergencyQueue } from './emergencyQueue';
import { MatchingEngine } from './matchingEngine';
import { MatchLedger } from './matchLedger';

/**
 * Everything the engine owns, built once per process (or per test)
 *
 * No module-level state: two contexts never share donors, tickets
 * or history.
 */
export interface EngineContext {
    graph: DistanceGraph;
    registry: DonorRegistry;
    ledger: MatchLedger;
    matchingEngine: MatchingEngine;
    emergencyQueue: EmergencyQueue;
}

export function createEngineContext(siteGraph: SiteGraphConfig): EngineContext {
    const graph = new DistanceGraph(siteGraph);
    const registry = new DonorRegistry(graph);
    const ledger = new MatchLedger();
    const matchingEngine = new MatchingEngine(registry, graph, ledger);
    const emergencyQueue = new EmergencyQueue(matchingEngine);

    return { graph, registry, ledger, matchingEngine, emergencyQueue };
}

/**
 * Register a batch of donors, e.g. sample data at startup
 */
export function seedDonors(context: EngineContext, registrations: DonorRegistration[]): Donor[] {
    const donors = registrations.map(registration => context.registry.register(registration));
    logger.info(`Seeded ${donors.length} donors`);
    return donors;
}
