import { logger } from '../infra/logger.js';
import { env } from '../config/env.js';
import { rotateToAnchor } from './cycle_resolver.js';
import type { ConversionHop, RateSource } from './types.js';

export interface ProfitSimulatorOptions {
    anchor: string;
    startingAmount: number;
}

export type SimulationResult =
    | {
        ok: true;
        cycle: string[];
        hops: ConversionHop[];
        startingAmount: number;
        finalAmount: number;
        profit: number;
    }
    | {
        ok: false;
        reason: 'missing_rate_for_hop';
        from: string;
        to: string;
    };

/**
 * Replays a detected cycle against live rates and keeps the session profit
 */
export class ProfitSimulator {
    private totalProfit = 0;
    private readonly anchor: string;
    private readonly startingAmount: number;

    constructor(options: Partial<ProfitSimulatorOptions> = {}) {
        this.anchor = options.anchor ?? env.ARB_ANCHOR_CURRENCY;
        this.startingAmount = options.startingAmount ?? env.ARB_STARTING_AMOUNT;
    }

    public get sessionProfit(): number {
        return this.totalProfit;
    }

    /**
     * Walk `cycle` from the anchor, converting the starting amount hop by hop.
     * A hop with no live rate in either direction aborts the pass without touching the total.
     */
    public simulate(cycle: readonly string[], rates: RateSource): SimulationResult {
        const rotated = rotateToAnchor(cycle, this.anchor);
        const hops: ConversionHop[] = [];
        let amount = this.startingAmount;

        for (let i = 0; i < rotated.length - 1; i++) {
            const from = rotated[i];
            const to = rotated[i + 1];
            const rate = rates.rate(from, to);

            if (rate === undefined) {
                logger.warn('arb.simulation.missing_rate', {
                    from,
                    to,
                    cycle: rotated.join(' -> '),
                });
                return { ok: false, reason: 'missing_rate_for_hop', from, to };
            }

            amount *= rate;
            hops.push({ from, to, rate, amount });
        }

        const profit = amount - this.startingAmount;
        this.totalProfit += profit;

        logger.warn('arb.opportunity', {
            start: `${this.anchor} ${this.startingAmount}`,
            hops: hops.map(h => `${h.from} -> ${h.to} @ ${h.rate.toFixed(6)} = ${h.to} ${h.amount.toFixed(6)}`),
            profit: `${profit.toFixed(2)} ${this.anchor}`,
            sessionProfit: `${this.totalProfit.toFixed(2)} ${this.anchor}`,
        });

        return {
            ok: true,
            cycle: rotated,
            hops,
            startingAmount: this.startingAmount,
            finalAmount: amount,
            profit,
        };
    }
}
