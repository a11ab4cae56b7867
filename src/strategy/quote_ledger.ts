import { logger } from '../infra/logger.js';
import { env } from '../config/env.js';
import type { QuoteRecord } from '../data/forex/types.js';
import type {
    Graph,
    GraphEdge,
    IngestReport,
    MarketEntry,
    QuoteRejectReason,
    QuoteRejection,
    RateSource,
} from './types.js';

const CURRENCY_PATTERN = /^[A-Z]{3}$/;

export interface QuoteLedgerOptions {
    expiryMs: number;
}

export function pairIdOf(base: string, quote: string): string {
    return `${base}/${quote}`;
}

// Both orientations of a pair share one sequence
function sequenceKeyOf(base: string, quote: string): string {
    return base < quote ? pairIdOf(base, quote) : pairIdOf(quote, base);
}

function formatMicros(micros: bigint): string {
    const date = new Date(Number(micros / 1000n));
    return Number.isNaN(date.getTime()) ? `${micros}us` : date.toISOString();
}

/**
 * Live quote book.
 *
 * Each unordered pair owns a single cell, keyed by the orientation first seen for it;
 * quotes arriving in the opposite orientation update that cell with the inverted rate.
 * Sequencing is tracked per unordered pair, whatever the wire orientation, and survives
 * expiry, so a late quote in either orientation can never overwrite a newer price.
 */
export class QuoteLedger implements RateSource {
    private entries = new Map<string, MarketEntry>();
    private lastSeenMicros = new Map<string, bigint>();
    private readonly expiryMs: number;

    constructor(options: Partial<QuoteLedgerOptions> = {}) {
        this.expiryMs = options.expiryMs ?? env.ARB_QUOTE_EXPIRY_MS;
    }

    /**
     * Apply validation and sequencing rules, then record accepted quotes at `now` (ms)
     */
    public ingest(records: ReadonlyArray<Partial<QuoteRecord>>, now: number): IngestReport {
        const report: IngestReport = { accepted: [], rejected: [] };

        for (const record of records) {
            const { baseCurrency, quoteCurrency, rate, timestampMicros } = record;

            if (
                baseCurrency === undefined || !CURRENCY_PATTERN.test(baseCurrency) ||
                quoteCurrency === undefined || !CURRENCY_PATTERN.test(quoteCurrency)
            ) {
                this.reject(report, null, 'incomplete_quote', record);
                continue;
            }

            const pairId = pairIdOf(baseCurrency, quoteCurrency);

            if (
                rate === undefined || !Number.isFinite(rate) || rate <= 0 ||
                timestampMicros === undefined || timestampMicros <= 0n
            ) {
                this.reject(report, pairId, 'incomplete_quote', record);
                continue;
            }

            if (baseCurrency === quoteCurrency) {
                this.reject(report, pairId, 'same_currency', record);
                continue;
            }

            logger.debug('fx.quote', {
                time: formatMicros(timestampMicros),
                base: baseCurrency,
                quote: quoteCurrency,
                rate,
            });

            const sequenceKey = sequenceKeyOf(baseCurrency, quoteCurrency);
            const lastSeen = this.lastSeenMicros.get(sequenceKey);
            if (lastSeen !== undefined && timestampMicros <= lastSeen) {
                this.reject(report, pairId, 'out_of_sequence', record);
                continue;
            }

            this.lastSeenMicros.set(sequenceKey, timestampMicros);
            this.store(baseCurrency, quoteCurrency, rate, now);
            report.accepted.push(pairId);
        }

        return report;
    }

    /**
     * Drop every entry older than the freshness window; returns the removed pair ids
     */
    public expireStale(now: number): string[] {
        const removed: string[] = [];

        for (const [pairId, entry] of this.entries) {
            if (now - entry.receivedAt > this.expiryMs) {
                removed.push(pairId);
            }
        }

        for (const pairId of removed) {
            this.entries.delete(pairId);
            logger.debug('fx.quote.expired', { pairId, expiryMs: this.expiryMs });
        }

        return removed;
    }

    /**
     * Build the log-weighted conversion graph from the live entries
     */
    public toGraph(): Graph {
        const vertices = new Set<string>();
        const edges: GraphEdge[] = [];

        for (const entry of this.entries.values()) {
            vertices.add(entry.base);
            vertices.add(entry.quote);

            const weight = -Math.log(entry.price);
            edges.push({ from: entry.base, to: entry.quote, weight });
            // Exact negation keeps a pair's two edges summing to zero
            edges.push({ from: entry.quote, to: entry.base, weight: -weight });
        }

        return { vertices: Array.from(vertices), edges };
    }

    /**
     * Conversion rate from -> to, derived by inversion when stored the other way round
     */
    public rate(from: string, to: string): number | undefined {
        const direct = this.entries.get(pairIdOf(from, to));
        if (direct) {
            return direct.price;
        }
        const reverse = this.entries.get(pairIdOf(to, from));
        return reverse ? 1 / reverse.price : undefined;
    }

    public has(pairId: string): boolean {
        return this.entries.has(pairId);
    }

    public entry(pairId: string): MarketEntry | undefined {
        return this.entries.get(pairId);
    }

    /**
     * Latest accepted timestamp for the pair, in either orientation
     */
    public lastSeen(pairId: string): bigint | undefined {
        const [base = '', quote = ''] = pairId.split('/');
        return this.lastSeenMicros.get(sequenceKeyOf(base, quote));
    }

    public get size(): number {
        return this.entries.size;
    }

    private store(base: string, quote: string, rate: number, now: number): void {
        const reverse = this.entries.get(pairIdOf(quote, base));
        if (reverse) {
            reverse.price = 1 / rate;
            reverse.receivedAt = now;
            return;
        }

        const pairId = pairIdOf(base, quote);
        const existing = this.entries.get(pairId);
        if (existing) {
            existing.price = rate;
            existing.receivedAt = now;
            return;
        }

        this.entries.set(pairId, { base, quote, price: rate, receivedAt: now });
    }

    private reject(
        report: IngestReport,
        pairId: string | null,
        reason: QuoteRejectReason,
        record: Partial<QuoteRecord>
    ): void {
        const rejection: QuoteRejection = { pairId, reason, record };
        report.rejected.push(rejection);

        if (reason === 'out_of_sequence') {
            logger.debug('fx.quote.out_of_sequence', {
                pairId,
                timestampMicros: record.timestampMicros,
                lastSeenMicros: pairId ? this.lastSeen(pairId) : undefined,
            });
            return;
        }

        logger.warn('fx.quote.rejected', { pairId, reason, record });
    }
}
