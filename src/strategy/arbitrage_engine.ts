import { logger } from '../infra/logger.js';
import { env } from '../config/env.js';
import { decodeMessage } from '../data/forex/wire_codec.js';
import type { MalformedFrame, QuoteRecord } from '../data/forex/types.js';
import { QuoteLedger } from './quote_ledger.js';
import { findNegativeCycle } from './bellman_ford.js';
import { resolveCycle } from './cycle_resolver.js';
import { ProfitSimulator } from './profit_simulator.js';
import type { ArbitrageEvent, BatchReport, DiscardReason } from './types.js';

export interface ArbitrageEngineOptions {
    anchor: string;
    expiryMs: number;
    startingAmount: number;
    tolerance?: number;
    /** Replaces the default simulator built from `anchor` and `startingAmount` */
    simulator?: ProfitSimulator;
}

/**
 * Quote batch pipeline: ingest -> expire -> graph -> detect -> resolve -> simulate.
 * Every step is synchronous, so a batch never observes a half-updated ledger.
 */
export class ArbitrageEngine {
    private readonly ledger: QuoteLedger;
    private readonly simulator: ProfitSimulator;
    private readonly anchor: string;
    private readonly tolerance: number | undefined;

    constructor(options: Partial<ArbitrageEngineOptions> = {}) {
        this.anchor = options.anchor ?? env.ARB_ANCHOR_CURRENCY;
        this.tolerance = options.tolerance;
        this.ledger = new QuoteLedger({ expiryMs: options.expiryMs ?? env.ARB_QUOTE_EXPIRY_MS });
        this.simulator = options.simulator ?? new ProfitSimulator({
            anchor: this.anchor,
            startingAmount: options.startingAmount ?? env.ARB_STARTING_AMOUNT,
        });

        logger.info('arb.engine.init', {
            anchor: this.anchor,
            expiryMs: options.expiryMs ?? env.ARB_QUOTE_EXPIRY_MS,
            startingAmount: options.startingAmount ?? env.ARB_STARTING_AMOUNT,
        });
    }

    public get sessionProfit(): number {
        return this.simulator.sessionProfit;
    }

    public get anchorCurrency(): string {
        return this.anchor;
    }

    public get quotes(): QuoteLedger {
        return this.ledger;
    }

    /**
     * Decode a raw datagram and run it through the pipeline
     */
    public processMessage(data: Uint8Array, now: number): BatchReport {
        const decoded = decodeMessage(data);

        for (const frame of decoded.malformed) {
            logger.warn('fx.frame.malformed', frame);
        }
        if (decoded.trailingBytes > 0) {
            logger.debug('fx.frame.trailing', { bytes: decoded.trailingBytes });
        }

        return this.run(decoded.quotes, now, decoded.malformed);
    }

    public processQuotes(records: ReadonlyArray<Partial<QuoteRecord>>, now: number): BatchReport {
        return this.run(records, now, []);
    }

    private run(
        records: ReadonlyArray<Partial<QuoteRecord>>,
        now: number,
        malformed: MalformedFrame[]
    ): BatchReport {
        const ingest = this.ledger.ingest(records, now);
        const expired = this.ledger.expireStale(now);

        const report: BatchReport = {
            accepted: ingest.accepted,
            rejected: ingest.rejected,
            expired,
            malformed,
            opportunity: null,
            discard: null,
        };

        const graph = this.ledger.toGraph();
        const paths = findNegativeCycle(graph, this.anchor, { tolerance: this.tolerance });
        if (!paths) {
            return this.discard(report, 'no_anchor_vertex', { vertices: graph.vertices.length });
        }
        if (!paths.witness) {
            return this.discard(report, 'no_negative_cycle', { vertices: graph.vertices.length });
        }

        const resolved = resolveCycle(paths.witness, paths.predecessors, {
            anchor: this.anchor,
            maxSteps: graph.vertices.length,
        });
        if (!resolved.ok) {
            return this.discard(report, resolved.reason, {
                witness: `${paths.witness.from} -> ${paths.witness.to}`,
            });
        }

        const simulation = this.simulator.simulate(resolved.cycle, this.ledger);
        if (!simulation.ok) {
            return this.discard(report, simulation.reason, {
                hop: `${simulation.from} -> ${simulation.to}`,
            });
        }

        const opportunity: ArbitrageEvent = {
            cycle: simulation.cycle,
            profitAmount: simulation.profit,
            profitCurrency: this.anchor,
            hops: simulation.hops,
            detectedAt: now,
        };
        report.opportunity = opportunity;
        return report;
    }

    private discard(report: BatchReport, reason: DiscardReason, data: Record<string, unknown>): BatchReport {
        logger.debug('arb.discard', {
            reason,
            ...data,
        });
        report.discard = reason;
        return report;
    }
}
