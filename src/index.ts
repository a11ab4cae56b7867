import { env } from './config/env.js';
import { logger } from './infra/logger.js';
import { ArbitrageEngine } from './strategy/arbitrage_engine.js';
import { ForexSubscriber } from './data/forex/subscriber.js';

// Global reference so signal handlers can reach the running subscriber
let subscriber: ForexSubscriber | null = null;

/**
 * Main application entry point
 */
async function main() {
    // Log boot event
    logger.info('app.boot', {
        message: 'Application starting...',
        environment: env.NODE_ENV,
    });

    console.log('\n✅ Boot OK');
    console.log(`⏰ Timestamp: ${new Date().toISOString()}`);
    console.log(`🌍 Environment: ${env.NODE_ENV}`);
    console.log(`📝 Log Level: ${env.LOG_LEVEL}`);
    console.log(`💾 Log to File: ${env.LOG_TO_FILE ? 'Enabled' : 'Disabled'}`);
    console.log(`\n🔸 Forex Provider:`);
    console.log(`  📡 Provider: ${env.FX_PROVIDER_HOST}:${env.FX_PROVIDER_PORT}`);
    console.log(`  👂 Listen: ${env.FX_LISTEN_HOST}:${env.FX_LISTEN_PORT}`);
    console.log(`  ⏱️  Idle Timeout: ${env.FX_IDLE_TIMEOUT_MS}ms (+${env.FX_SHUTDOWN_GRACE_MS}ms grace)`);
    console.log(`  ⌛ Subscription: ${env.FX_SUBSCRIPTION_MS}ms`);
    console.log(`\n🎯 Arbitrage Detection:`);
    console.log(`  💵 Anchor: ${env.ARB_ANCHOR_CURRENCY}`);
    console.log(`  🕒 Quote Expiry: ${env.ARB_QUOTE_EXPIRY_MS}ms`);
    console.log(`  💰 Starting Amount: ${env.ARB_STARTING_AMOUNT}\n`);

    const engine = new ArbitrageEngine();

    subscriber = new ForexSubscriber(engine);
    subscriber.start();

    logger.info('app.ready', {
        message: 'Application initialized successfully',
        features: {
            config: 'loaded',
            logger: 'initialized',
            engine: 'ready',
            subscriber: 'started',
        },
    });

    const reason = await subscriber.done();

    logger.info('app.exit', {
        reason,
        sessionProfit: `${engine.sessionProfit.toFixed(2)} ${engine.anchorCurrency}`,
    });
}

/**
 * Graceful shutdown handler
 */
function gracefulShutdown(signal: string) {
    logger.info('app.shutdown', {
        message: `Received ${signal}, shutting down gracefully...`,
    });

    if (subscriber) {
        subscriber.stop('signal');
    }
}

// Register shutdown handlers
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

// Start the application
main().then(() => {
    process.exit(0);
}).catch((error) => {
    logger.error('app.fatal', {
        message: 'Fatal error during application startup',
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
});
