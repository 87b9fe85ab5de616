/**
 * Response shaping for MCP tools
 * Turns raw BrainLift records into the payloads agents receive
 */

import type { Brainlift, BrainliftNode, QualityDimensions } from '../api/BrainliftApi.js';

export const DOK_LEVELS = [1, 2, 3, 4] as const;

export interface BrainliftSummary {
    id: string;
    title: string;
    quality_score: number | '';
    updated_at: string;
}

export interface BrainliftInfo {
    brainlift_title: string;
    stats: {
        created_at: string;
        updated_at: string;
        quality_score: number | '';
        quality_dimensions: QualityDimensions;
        visibility: string;
    };
    brainlift_contents: string;
}

export type DokDump = { brainlift_title: string } & Record<`dok${number}`, string[]>;

export function toSummaries(brainlifts: Brainlift[]): BrainliftSummary[] {
    return brainlifts.map((b) => ({
        id: b.id,
        title: b.title ?? '',
        quality_score: b.quality_score ?? '',
        updated_at: b.updated_at ?? '',
    }));
}

/**
 * Depth-first by parent, siblings by position. Nodes whose parent is not in
 * the set are treated as roots.
 */
export function orderNodes(nodes: BrainliftNode[]): BrainliftNode[] {
    const ids = new Set(nodes.map((n) => n.id));
    const children = new Map<string | null, BrainliftNode[]>();

    for (const node of nodes) {
        const parent = node.parent_id && ids.has(node.parent_id) ? node.parent_id : null;
        const siblings = children.get(parent) ?? [];
        siblings.push(node);
        children.set(parent, siblings);
    }
    for (const siblings of children.values()) {
        siblings.sort((a, b) => (a.position ?? 0) - (b.position ?? 0));
    }

    const ordered: BrainliftNode[] = [];
    const visited = new Set<string>();
    const visit = (parent: string | null) => {
        for (const node of children.get(parent) ?? []) {
            if (visited.has(node.id)) continue;
            visited.add(node.id);
            ordered.push(node);
            visit(node.id);
        }
    };
    visit(null);

    // Parent cycles never reach a root; keep them rather than drop content
    for (const node of nodes) {
        if (!visited.has(node.id)) ordered.push(node);
    }
    return ordered;
}

export function toBrainliftInfo(brainlift: Brainlift, nodes: BrainliftNode[]): BrainliftInfo {
    return {
        brainlift_title: brainlift.title ?? '',
        stats: {
            created_at: brainlift.created_at ?? '',
            updated_at: brainlift.updated_at ?? '',
            quality_score: brainlift.quality_score ?? '',
            quality_dimensions: brainlift.quality_dimensions ?? {},
            visibility: brainlift.visibility ?? '',
        },
        brainlift_contents: orderNodes(nodes)
            .map((n) => `DoK Level ${n.dok_level ?? 'Not Found'}: ${n.content ?? ''}`)
            .join('\n'),
    };
}

export function toDokDump(brainlift: Brainlift, nodes: BrainliftNode[], levels: readonly number[]): DokDump {
    const invalid = levels.filter((level) => !(DOK_LEVELS as readonly number[]).includes(level));
    if (invalid.length > 0) {
        throw new Error(`Invalid DOK levels: ${invalid.join(', ')}. Must be 1, 2, 3, or 4`);
    }

    const ordered = orderNodes(nodes);
    const dump: DokDump = { brainlift_title: brainlift.title ?? '' };
    for (const level of levels) {
        dump[`dok${level}`] = ordered.filter((n) => n.dok_level === level).map((n) => n.content ?? '');
    }
    return dump;
}
