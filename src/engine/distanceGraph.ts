// src/engine/distanceGraph.ts

import { SiteGraphConfig } from '../models/Site';
import { MinHeap } from './minHeap';

/**
 * Returned when either site is unknown or no path connects them
 */
export const UNREACHABLE = Number.POSITIVE_INFINITY;

interface FrontierEntry {
    site: string;
    distance: number;
}

/**
 * Weighted undirected graph over named sites
 *
 * Edges are stored in both directions; self-distance is always 0.
 * Weights must be non-negative (Dijkstra precondition).
 */
export class DistanceGraph {
    private adjacency: Map<string, Map<string, number>>;

    constructor(config: SiteGraphConfig) {
        this.adjacency = new Map();

        for (const site of config.sites) {
            this.adjacency.set(site, new Map());
        }

        for (const edge of config.edges) {
            const fromNeighbors = this.adjacency.get(edge.from);
            const toNeighbors = this.adjacency.get(edge.to);
            if (!fromNeighbors || !toNeighbors) {
                throw new Error(`Edge ${edge.from} -> ${edge.to} references an undeclared site`);
            }
            if (!(edge.km >= 0) || !Number.isFinite(edge.km)) {
                throw new Error(`Edge ${edge.from} -> ${edge.to} has invalid weight ${edge.km}`);
            }
            if (edge.from === edge.to) {
                continue;
            }

            // Keep the shorter weight if an edge is declared twice
            const current = fromNeighbors.get(edge.to) ?? UNREACHABLE;
            const km = Math.min(current, edge.km);
            fromNeighbors.set(edge.to, km);
            toNeighbors.set(edge.from, km);
        }
    }

    hasSite(site: string): boolean {
        return this.adjacency.has(site);
    }

    listSites(): string[] {
        return Array.from(this.adjacency.keys());
    }

    /**
     * Shortest path distance between two sites (Dijkstra)
     *
     * Stops as soon as the target is settled.
     *
     * @returns Distance in km, or UNREACHABLE
     */
    shortestDistance(from: string, to: string): number {
        if (!this.hasSite(from) || !this.hasSite(to)) {
            return UNREACHABLE;
        }
        if (from === to) {
            return 0;
        }

        const distances = new Map<string, number>([[from, 0]]);
        const settled = new Set<string>();
        const frontier = new MinHeap<FrontierEntry>((a, b) => a.distance - b.distance);
        frontier.push({ site: from, distance: 0 });

        while (frontier.size > 0) {
            const entry = frontier.pop();
            if (!entry || settled.has(entry.site)) {
                continue;
            }
            settled.add(entry.site);

            if (entry.site === to) {
                return entry.distance;
            }

            const neighbors = this.adjacency.get(entry.site) ?? new Map<string, number>();
            for (const [neighbor, km] of neighbors) {
                if (settled.has(neighbor)) {
                    continue;
                }
                const candidate = entry.distance + km;
                if (candidate < (distances.get(neighbor) ?? UNREACHABLE)) {
                    distances.set(neighbor, candidate);
                    frontier.push({ site: neighbor, distance: candidate });
                }
            }
        }

        return UNREACHABLE;
    }
}
