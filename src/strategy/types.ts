import type { MalformedFrame, QuoteRecord } from '../data/forex/types.js';

/**
 * Latest accepted quote for one unordered currency pair
 */
export interface MarketEntry {
    base: string;
    quote: string;
    price: number;              // base -> quote
    receivedAt: number;         // Local ms at acceptance, not the wire timestamp
}

export type QuoteRejectReason =
    | 'incomplete_quote'
    | 'same_currency'
    | 'out_of_sequence';

export interface QuoteRejection {
    pairId: string | null;      // null when the currencies themselves are unusable
    reason: QuoteRejectReason;
    record: Partial<QuoteRecord>;
}

export interface IngestReport {
    accepted: string[];
    rejected: QuoteRejection[];
}

export interface GraphEdge {
    from: string;
    to: string;
    weight: number;             // -ln(rate from -> to)
}

export interface Graph {
    vertices: string[];
    edges: GraphEdge[];
}

/**
 * Anything that can price a single conversion hop
 */
export interface RateSource {
    rate(from: string, to: string): number | undefined;
}

/**
 * Discard reason for passes that produce no actionable opportunity
 */
export type DiscardReason =
    | 'no_anchor_vertex'
    | 'no_negative_cycle'
    | 'degenerate_cycle'
    | 'corrupted_cycle'
    | 'anchor_not_in_cycle'
    | 'missing_rate_for_hop';

export interface ConversionHop {
    from: string;
    to: string;
    rate: number;
    amount: number;             // Running amount after this hop, in `to` units
}

/**
 * Arbitrage signal handed to the transport for reporting
 */
export interface ArbitrageEvent {
    cycle: string[];            // Closed, starts and ends at the anchor
    profitAmount: number;
    profitCurrency: string;
    hops: ConversionHop[];
    detectedAt: number;
}

export interface BatchReport {
    accepted: string[];
    rejected: QuoteRejection[];
    expired: string[];
    malformed: MalformedFrame[];
    opportunity: ArbitrageEvent | null;
    discard: DiscardReason | null;
}
