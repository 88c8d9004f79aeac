// src/models/Site.ts

/**
 * Undirected weighted edge between two named sites
 */
export interface SiteEdge {
    from: string;
    to: string;
    km: number;
}

/**
 * Site graph configuration
 *
 * Invariant: every edge endpoint is listed in sites, km >= 0
 */
export interface SiteGraphConfig {
    sites: string[];
    edges: SiteEdge[];
}
