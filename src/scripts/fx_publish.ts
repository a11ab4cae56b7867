/**
 * Local forex quote publisher
 *
 * Usage:
 *   npm run fx:publish
 *
 * Listens on FX_PROVIDER_PORT for subscription handshakes and streams random-walk
 * quotes to every subscriber. Every FX_PUBLISH_ARB_EVERY-th batch carries a USD
 * triangle that pays out, so the subscriber has something to find.
 */

import { createSocket, type RemoteInfo } from 'dgram';
import { env } from '../config/env.js';
import { logger } from '../infra/logger.js';
import { deserializeAddress, encodeQuotes, HANDSHAKE_SIZE } from '../data/forex/wire_codec.js';
import type { QuoteInput, SubscriberAddress } from '../data/forex/types.js';

// Mid rates the walk starts from
const CROSSES: Record<string, number> = {
    'USD/EUR': 0.92,
    'EUR/GBP': 0.86,
    'GBP/USD': 1.265,
    'USD/JPY': 151.4,
    'EUR/JPY': 164.5,
    'USD/CHF': 0.89,
    'EUR/CHF': 0.967,
    'USD/CAD': 1.37,
};

const WALK_BPS = 5;
const ARB_SKEW = 1.004;

const rates = new Map<string, number>(Object.entries(CROSSES));
const subscribers = new Map<string, SubscriberAddress>();
let batch = 0;

function walk(price: number): number {
    const drift = (Math.random() * 2 - 1) * WALK_BPS / 10000;
    return price * (1 + drift);
}

/**
 * Consistent USD -> EUR -> GBP -> USD triangle, then skewed on the closing leg
 */
function triangle(): QuoteInput[] {
    const usdEur = rates.get('USD/EUR') ?? CROSSES['USD/EUR'];
    const eurGbp = rates.get('EUR/GBP') ?? CROSSES['EUR/GBP'];
    const gbpUsd = (1 / (usdEur * eurGbp)) * ARB_SKEW;
    const time = Date.now() / 1000;

    return [
        { cross: 'USD/EUR', price: usdEur, time },
        { cross: 'EUR/GBP', price: eurGbp, time },
        { cross: 'GBP/USD', price: gbpUsd, time },
    ];
}

function nextBatch(): QuoteInput[] {
    batch++;

    if (batch % env.FX_PUBLISH_ARB_EVERY === 0) {
        return triangle();
    }

    const time = Date.now() / 1000;
    const quotes: QuoteInput[] = [];
    for (const [cross, price] of rates) {
        // Publish roughly half the book per batch
        if (Math.random() < 0.5) continue;
        const next = walk(price);
        rates.set(cross, next);
        quotes.push({ cross, price: next, time });
    }
    return quotes;
}

async function main() {
    const socket = createSocket('udp4');

    socket.on('message', (msg: Buffer, rinfo: RemoteInfo) => {
        if (msg.length < HANDSHAKE_SIZE) {
            logger.warn('publisher.handshake.invalid', { from: rinfo.address, bytes: msg.length });
            return;
        }
        const address = deserializeAddress(msg);
        const key = `${address.host}:${address.port}`;
        subscribers.set(key, address);
        logger.info('publisher.subscribed', { subscriber: key, total: subscribers.size });
    });

    socket.on('error', (error) => {
        logger.error('publisher.socket.error', { error: error.message });
    });

    await new Promise<void>(resolve => socket.bind(env.FX_PROVIDER_PORT, resolve));

    console.log(`\n📡 Publishing on udp://0.0.0.0:${env.FX_PROVIDER_PORT}`);
    console.log(`⏱️  Interval: ${env.FX_PUBLISH_INTERVAL_MS}ms, arbitrage every ${env.FX_PUBLISH_ARB_EVERY} batches\n`);

    const timer = setInterval(() => {
        if (subscribers.size === 0) return;

        const quotes = nextBatch();
        if (quotes.length === 0) return;

        const message = encodeQuotes(quotes);
        for (const [key, address] of subscribers) {
            socket.send(message, address.port, address.host, (error) => {
                if (error) {
                    logger.error('publisher.send.failed', { subscriber: key, error: error.message });
                    subscribers.delete(key);
                }
            });
        }

        logger.debug('publisher.batch', { batch, quotes: quotes.length, subscribers: subscribers.size });
    }, env.FX_PUBLISH_INTERVAL_MS);

    const shutdown = () => {
        clearInterval(timer);
        socket.close();
        console.log('\n👋 Publisher stopped');
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((error) => {
    console.error('❌ Fatal error:', error);
    process.exit(1);
});
