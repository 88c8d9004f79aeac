// src/engine/__tests__/helpers.ts

import path from 'path';
import { format, parseISO, subDays } from 'date-fns';
import { loadSiteGraph } from '../../config/dataFiles';
import { createEngineContext, EngineContext } from '../engineContext';
import { SiteGraphConfig } from '../../models/Site';

export const DEFAULT_GRAPH_PATH = path.resolve(__dirname, '..', '..', '..', 'data', 'siteGraph.json');

export function defaultGraph(): SiteGraphConfig {
    return loadSiteGraph(DEFAULT_GRAPH_PATH);
}

export function newContext(): EngineContext {
    return createEngineContext(defaultGraph());
}

/** Local midnight, so day arithmetic is not skewed by time zones */
export const NOW = parseISO('2026-06-01');

export function daysAgo(days: number, now: Date = NOW): string {
    return format(subDays(now, days), 'yyyy-MM-dd');
}
