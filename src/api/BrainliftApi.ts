/**
 * BrainLift API
 * Read-only access to the signed-in user's BrainLifts and their nodes
 */

import type { HttpClient } from '../client/HttpClient.js';
import type { OwnershipMode } from '../utils/config.js';

export interface QualityDimensions {
    gaps?: number;
    spiky_pov?: number;
    consistent?: number;
    topic_focus?: number;
    dok_coverage?: number;
    digest_quality?: number;
    link_discipline?: number;
}

export interface Brainlift {
    id: string;
    title?: string;
    user_id?: string;
    quality_score?: number | null;
    quality_dimensions?: QualityDimensions | null;
    visibility?: string;
    created_at?: string;
    updated_at?: string;
}

export interface BrainliftNode {
    id: string;
    parent_id?: string | null;
    position?: number;
    dok_level?: number | null;
    content?: string;
    status?: string;
    row_version?: number;
}

/** Where BrainLift data comes from: the live API or the canned demo set */
export interface BrainliftSource {
    listBrainlifts(): Promise<Brainlift[]>;
    getBrainlift(brainliftId: string): Promise<Brainlift>;
    getNodes(brainliftId: string): Promise<BrainliftNode[]>;
}

/** Supplies the Supabase user id for ownership filters */
export interface SubjectSource {
    getUserId(): Promise<string>;
}

const REST_PREFIX = '/rest/v1/brainlifts';
const API_PREFIX = '/api/brainlifts';

export class BrainliftApi implements BrainliftSource {
    constructor(
        private readonly http: HttpClient,
        private readonly subject: SubjectSource,
        private readonly ownership: OwnershipMode = 'filter',
    ) {}

    /**
     * GET /brainlifts → [{ id, title, quality_score, created_at, updated_at, ... }]
     */
    async listBrainlifts(): Promise<Brainlift[]> {
        if (this.ownership === 'endpoint') {
            return this.http.get<Brainlift[]>(API_PREFIX);
        }

        return this.http.get<Brainlift[]>(REST_PREFIX, {
            params: await this.ownerFilter(),
        });
    }

    /**
     * GET /brainlifts/{id} → { id, title, quality_score, quality_dimensions, visibility, ... }
     */
    async getBrainlift(brainliftId: string): Promise<Brainlift> {
        const id = encodeURIComponent(brainliftId);

        if (this.ownership === 'endpoint') {
            return this.http.get<Brainlift>(`${API_PREFIX}/${id}`, { resourceId: brainliftId });
        }

        return this.http.get<Brainlift>(`${REST_PREFIX}/${id}`, {
            params: await this.ownerFilter(),
            resourceId: brainliftId,
        });
    }

    /**
     * GET /brainlifts/{id}/nodes → [{ id, parent_id, position, dok_level, content, status, row_version }]
     */
    async getNodes(brainliftId: string): Promise<BrainliftNode[]> {
        const prefix = this.ownership === 'endpoint' ? API_PREFIX : REST_PREFIX;
        return this.http.get<BrainliftNode[]>(`${prefix}/${encodeURIComponent(brainliftId)}/nodes`, {
            resourceId: brainliftId,
        });
    }

    private async ownerFilter(): Promise<Record<string, string>> {
        const userId = await this.subject.getUserId();
        return { user_id: `eq.${userId}` };
    }
}
