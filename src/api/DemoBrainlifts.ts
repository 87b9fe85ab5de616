/**
 * Demo BrainLifts
 * Fixed payloads served when demo mode is on; no network, no authentication
 */

import type { Brainlift, BrainliftNode, BrainliftSource } from './BrainliftApi.js';
import { NotFoundError } from '../utils/errors.js';

export const DEMO_USER_ID = 'demo-user';

const DEMO_BRAINLIFTS: Brainlift[] = [
    {
        id: 'demo-brainlift-1',
        title: 'Spaced Repetition for Adult Learners',
        user_id: DEMO_USER_ID,
        quality_score: 72,
        quality_dimensions: {
            gaps: 3,
            spiky_pov: 4,
            consistent: 4,
            topic_focus: 5,
            dok_coverage: 3,
            digest_quality: 4,
            link_discipline: 2,
        },
        visibility: 'private',
        created_at: '2025-01-06T09:15:00Z',
        updated_at: '2025-02-11T17:40:00Z',
    },
    {
        id: 'demo-brainlift-2',
        title: 'Small Teams Shipping Fast',
        user_id: DEMO_USER_ID,
        quality_score: 48,
        quality_dimensions: {
            gaps: 2,
            spiky_pov: 2,
            consistent: 3,
            topic_focus: 3,
            dok_coverage: 2,
            digest_quality: 3,
            link_discipline: 3,
        },
        visibility: 'public',
        created_at: '2025-03-02T12:00:00Z',
        updated_at: '2025-03-04T08:30:00Z',
    },
];

const DEMO_NODES: Record<string, BrainliftNode[]> = {
    'demo-brainlift-1': [
        { id: 'n1', parent_id: null, position: 0, dok_level: 4, content: 'Spiky POV: streaks matter more than schedules.', status: 'active' },
        { id: 'n2', parent_id: 'n1', position: 0, dok_level: 3, content: 'Learners who review daily retain more than those who follow optimal intervals loosely.', status: 'active' },
        { id: 'n3', parent_id: 'n2', position: 0, dok_level: 2, content: 'Summary: retention curves flatten after the third successful review.', status: 'active' },
        { id: 'n4', parent_id: 'n2', position: 1, dok_level: 1, content: 'Fact: the forgetting curve was first measured in the 1880s.', status: 'active' },
    ],
    'demo-brainlift-2': [
        { id: 'm1', parent_id: null, position: 0, dok_level: 3, content: 'Insight: fewer handoffs beat more people.', status: 'active' },
        { id: 'm2', parent_id: 'm1', position: 0, dok_level: 1, content: 'Fact: each added reviewer lengthens lead time.', status: 'active' },
    ],
};

export class DemoBrainlifts implements BrainliftSource {
    async listBrainlifts(): Promise<Brainlift[]> {
        return DEMO_BRAINLIFTS.map((b) => ({ ...b }));
    }

    async getBrainlift(brainliftId: string): Promise<Brainlift> {
        const found = DEMO_BRAINLIFTS.find((b) => b.id === brainliftId);
        if (!found) {
            throw new NotFoundError(brainliftId);
        }
        return { ...found };
    }

    async getNodes(brainliftId: string): Promise<BrainliftNode[]> {
        const nodes = DEMO_NODES[brainliftId];
        if (!nodes) {
            throw new NotFoundError(brainliftId);
        }
        return nodes.map((n) => ({ ...n }));
    }
}
