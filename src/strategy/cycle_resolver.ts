import type { DiscardReason, GraphEdge } from './types.js';

export interface ResolveOptions {
    anchor: string;
    maxSteps: number;           // Normally |V|
}

export type CycleResolution =
    | { ok: true; cycle: string[] }
    | { ok: false; reason: Extract<DiscardReason, 'degenerate_cycle' | 'corrupted_cycle' | 'anchor_not_in_cycle'> };

/**
 * Rebuild the cycle closed by `witness` by chasing predecessors back from its source.
 * The result is in forward order with the first vertex repeated at the end.
 */
export function resolveCycle(
    witness: Pick<GraphEdge, 'from' | 'to'>,
    predecessors: ReadonlyMap<string, string | null>,
    options: ResolveOptions
): CycleResolution {
    const { from: u, to: v } = witness;
    const path: string[] = [v];
    const visited = new Set<string>();
    let current: string | null = u;
    let steps = 0;

    while (current !== v) {
        if (current === null || visited.has(current) || steps >= options.maxSteps) {
            return { ok: false, reason: 'corrupted_cycle' };
        }
        visited.add(current);
        path.push(current);
        current = predecessors.get(current) ?? null;
        steps++;
    }

    path.push(v);
    path.reverse();

    if (path.length < 3) {
        return { ok: false, reason: 'degenerate_cycle' };
    }
    if (!path.includes(options.anchor)) {
        return { ok: false, reason: 'anchor_not_in_cycle' };
    }

    return { ok: true, cycle: path };
}

/**
 * Rotate a closed cycle so that it starts and ends at `anchor`
 */
export function rotateToAnchor(cycle: readonly string[], anchor: string): string[] {
    const open = cycle.slice(0, -1);
    const start = open.indexOf(anchor);
    if (start < 0) {
        throw new RangeError(`Cycle ${cycle.join(' -> ')} does not contain ${anchor}`);
    }
    const rotated = [...open.slice(start), ...open.slice(0, start)];
    rotated.push(anchor);
    return rotated;
}
