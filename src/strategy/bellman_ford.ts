import type { Graph, GraphEdge } from './types.js';

export interface NegativeCycleOptions {
    /** Minimum improvement an edge must still offer in the check pass to count as a witness */
    tolerance: number;
}

export interface ShortestPaths {
    distances: Map<string, number>;
    predecessors: Map<string, string | null>;
    witness: GraphEdge | null;
}

const DEFAULT_TOLERANCE = 1e-12;

/**
 * Bellman-Ford from `anchor`. After |V|-1 relaxation passes, the first edge (in graph
 * order) that still relaxes is returned as the witness of a reachable negative cycle.
 * Returns null when the anchor is not a vertex.
 */
export function findNegativeCycle(
    graph: Graph,
    anchor: string,
    options: Partial<NegativeCycleOptions> = {}
): ShortestPaths | null {
    if (!graph.vertices.includes(anchor)) {
        return null;
    }

    const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
    const distances = new Map<string, number>();
    const predecessors = new Map<string, string | null>();

    for (const vertex of graph.vertices) {
        distances.set(vertex, Infinity);
        predecessors.set(vertex, null);
    }
    distances.set(anchor, 0);

    const distanceOf = (vertex: string): number => distances.get(vertex) ?? Infinity;

    for (let pass = 0; pass < graph.vertices.length - 1; pass++) {
        let updated = false;
        for (const edge of graph.edges) {
            const candidate = distanceOf(edge.from) + edge.weight;
            if (candidate < distanceOf(edge.to)) {
                distances.set(edge.to, candidate);
                predecessors.set(edge.to, edge.from);
                updated = true;
            }
        }
        if (!updated) break; // Converged, nothing left to find
    }

    let witness: GraphEdge | null = null;
    for (const edge of graph.edges) {
        if (distanceOf(edge.from) + edge.weight < distanceOf(edge.to) - tolerance) {
            witness = edge;
            break;
        }
    }

    return { distances, predecessors, witness };
}
