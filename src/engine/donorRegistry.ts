// src/engine/donorRegistry.ts

import { v4 as uuidv4 } from 'uuid';
import { BLOOD_TYPES, BloodType } from '../models/BloodType';
import { Donor, DonorRegistration } from '../models/Donor';
import { logger } from '../config/logger';
import { InvalidSiteError } from '../utils/errors';
import { parseBloodType } from './compatibility';
import { DistanceGraph } from './distanceGraph';
import { isEligible } from './eligibility';

/**
 * Donor registry - owns every donor record
 *
 * Storage: flat insertion-ordered list plus a per-type index, so
 * listByType costs O(donors of that type), not O(registry).
 *
 * Donors are never deleted. The only mutation after registration is
 * markDonated. Reads hand out copies.
 */
export class DonorRegistry {
    private donors: Donor[];
    private byType: Map<BloodType, Donor[]>;
    private byId: Map<string, Donor>;
    private order: Map<string, number>;

    constructor(private readonly graph: DistanceGraph) {
        this.donors = [];
        this.byType = new Map(BLOOD_TYPES.map(type => [type, []]));
        this.byId = new Map();
        this.order = new Map();
    }

    /**
     * Validate and store a new donor
     *
     * @throws InvalidBloodTypeError, InvalidSiteError
     */
    register(registration: DonorRegistration): Donor {
        const bloodType = parseBloodType(registration.bloodType);
        const site = registration.site.trim();
        if (!this.graph.hasSite(site)) {
            throw new InvalidSiteError(registration.site);
        }

        const donor: Donor = {
            id: uuidv4(),
            name: registration.name.trim(),
            bloodType,
            site,
            lastDonationDate: registration.lastDonationDate,
            totalDonations: registration.totalDonations ?? 0
        };

        this.order.set(donor.id, this.donors.length);
        this.donors.push(donor);
        this.byId.set(donor.id, donor);
        this.typeBucket(bloodType).push(donor);

        logger.debug('Donor registered', { donorId: donor.id, bloodType, site });

        return { ...donor };
    }

    listAll(): Donor[] {
        return this.donors.map(donor => ({ ...donor }));
    }

    /**
     * Donors of one type in registration order
     *
     * @throws InvalidBloodTypeError for a non-canonical type
     */
    listByType(type: string): Donor[] {
        return this.typeBucket(parseBloodType(type)).map(donor => ({ ...donor }));
    }

    get(donorId: string): Donor | null {
        const donor = this.byId.get(donorId);
        return donor ? { ...donor } : null;
    }

    /**
     * Global registration index, used to break distance ties
     */
    registrationOrder(donorId: string): number {
        return this.order.get(donorId) ?? Number.MAX_SAFE_INTEGER;
    }

    isEligible(donor: Pick<Donor, 'lastDonationDate'>, now: Date): boolean {
        return isEligible(donor, now);
    }

    /**
     * Record a donation: reset cooldown to now, bump the counter
     *
     * @returns Updated copy of the donor
     */
    markDonated(donorId: string, now: Date): Donor {
        const donor = this.byId.get(donorId);
        if (!donor) {
            throw new Error(`Donor ${donorId} is not registered`);
        }

        donor.lastDonationDate = now.toISOString();
        donor.totalDonations += 1;

        return { ...donor };
    }

    size(): number {
        return this.donors.length;
    }

    private typeBucket(type: BloodType): Donor[] {
        let bucket = this.byType.get(type);
        if (!bucket) {
            bucket = [];
            this.byType.set(type, bucket);
        }
        return bucket;
    }
}
