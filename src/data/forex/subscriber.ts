import { createSocket } from 'dgram';
import { logger } from '../../infra/logger.js';
import { env } from '../../config/env.js';
import { serializeAddress } from './wire_codec.js';
import type { ArbitrageEngine } from '../../strategy/arbitrage_engine.js';

/**
 * The part of a UDP socket the subscriber relies on
 */
export interface DatagramSocket {
    bind(port: number, address: string, callback: () => void): void;
    send(msg: Uint8Array, port: number, address: string, callback: (error: Error | null) => void): void;
    on(event: 'message', listener: (msg: Buffer) => void): void;
    on(event: 'error', listener: (error: Error) => void): void;
    close(): void;
}

export type StopReason = 'idle' | 'subscription_elapsed' | 'signal' | 'socket_error';

export interface ForexSubscriberOptions {
    providerHost: string;
    providerPort: number;
    listenHost: string;
    listenPort: number;
    bufferSize: number;         // Largest datagram read, longer ones are cut
    idleTimeoutMs: number;
    shutdownGraceMs: number;
    subscriptionMs: number;
    createSocket: () => DatagramSocket;
}

function createUdpSocket(): DatagramSocket {
    return createSocket('udp4');
}

/**
 * Forex provider subscriber (UDP)
 *
 * Sends the subscription handshake, then feeds every datagram to the engine.
 * After `idleTimeoutMs` without traffic it warns, and shuts down if nothing arrives
 * within a further `shutdownGraceMs`.
 */
export class ForexSubscriber {
    private socket: DatagramSocket | null = null;
    private idleTimer: NodeJS.Timeout | null = null;
    private phaseTimer: NodeJS.Timeout | null = null;
    private isRunning = false;
    private isBound = false;
    private inGracePeriod = false;
    private batches = 0;
    private opportunities = 0;

    private readonly options: ForexSubscriberOptions;
    private readonly stopped: Promise<StopReason>;
    private resolveStopped: (reason: StopReason) => void = () => undefined;

    constructor(private readonly engine: ArbitrageEngine, options: Partial<ForexSubscriberOptions> = {}) {
        this.options = {
            providerHost: options.providerHost ?? env.FX_PROVIDER_HOST,
            providerPort: options.providerPort ?? env.FX_PROVIDER_PORT,
            listenHost: options.listenHost ?? env.FX_LISTEN_HOST,
            listenPort: options.listenPort ?? env.FX_LISTEN_PORT,
            bufferSize: options.bufferSize ?? env.FX_BUFFER_SIZE,
            idleTimeoutMs: options.idleTimeoutMs ?? env.FX_IDLE_TIMEOUT_MS,
            shutdownGraceMs: options.shutdownGraceMs ?? env.FX_SHUTDOWN_GRACE_MS,
            subscriptionMs: options.subscriptionMs ?? env.FX_SUBSCRIPTION_MS,
            createSocket: options.createSocket ?? createUdpSocket,
        };
        this.stopped = new Promise<StopReason>(resolve => {
            this.resolveStopped = resolve;
        });
    }

    /**
     * Bind the listening socket and subscribe to the provider
     */
    public start(): void {
        if (this.isRunning) {
            logger.warn('fx.subscriber.already_running', {
                listen: `${this.options.listenHost}:${this.options.listenPort}`,
            });
            return;
        }

        this.isRunning = true;
        const socket = this.options.createSocket();
        this.socket = socket;

        socket.on('message', msg => this.handleMessage(msg));
        socket.on('error', error => this.handleSocketError(error));

        socket.bind(this.options.listenPort, this.options.listenHost, () => {
            if (!this.isRunning) {
                return;
            }
            this.isBound = true;
            logger.info('fx.listening', {
                listen: `${this.options.listenHost}:${this.options.listenPort}`,
            });
            this.subscribe(socket);
            this.armIdleTimer();
        });

        this.phaseTimer = setTimeout(() => this.stop('subscription_elapsed'), this.options.subscriptionMs);
    }

    /**
     * Stop listening and report the session; safe to call more than once
     */
    public stop(reason: StopReason): void {
        if (!this.isRunning) {
            return;
        }
        this.isRunning = false;

        if (this.idleTimer) {
            clearTimeout(this.idleTimer);
            this.idleTimer = null;
        }

        if (this.phaseTimer) {
            clearTimeout(this.phaseTimer);
            this.phaseTimer = null;
        }

        if (this.socket) {
            this.socket.close();
            this.socket = null;
        }

        logger.info('fx.session.summary', {
            reason,
            batches: this.batches,
            opportunities: this.opportunities,
            totalProfit: `${this.engine.sessionProfit.toFixed(2)} ${this.engine.anchorCurrency}`,
        });

        this.resolveStopped(reason);
    }

    /**
     * Resolves once the subscriber has stopped
     */
    public done(): Promise<StopReason> {
        return this.stopped;
    }

    private subscribe(socket: DatagramSocket): void {
        const handshake = serializeAddress({
            host: this.options.listenHost,
            port: this.options.listenPort,
        });

        socket.send(handshake, this.options.providerPort, this.options.providerHost, error => {
            if (error) {
                logger.error('fx.subscribe.failed', {
                    provider: `${this.options.providerHost}:${this.options.providerPort}`,
                    error: error.message,
                });
                return;
            }
            logger.info('fx.subscribed', {
                provider: `${this.options.providerHost}:${this.options.providerPort}`,
                listen: `${this.options.listenHost}:${this.options.listenPort}`,
            });
        });
    }

    private handleMessage(msg: Buffer): void {
        if (!this.isRunning) {
            return;
        }

        this.inGracePeriod = false;
        this.armIdleTimer();
        this.batches++;

        let data = msg;
        if (msg.length > this.options.bufferSize) {
            logger.warn('fx.datagram.truncated', {
                bytes: msg.length,
                bufferSize: this.options.bufferSize,
            });
            data = msg.subarray(0, this.options.bufferSize);
        }

        try {
            const report = this.engine.processMessage(data, Date.now());

            if (report.opportunity) {
                this.opportunities++;
                logger.warn('fx.arbitrage', {
                    cycle: report.opportunity.cycle.join(' -> '),
                    profit: `${report.opportunity.profitAmount.toFixed(2)} ${report.opportunity.profitCurrency}`,
                });
            }
        } catch (error) {
            logger.error('fx.batch.error', {
                bytes: msg.length,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    }

    private handleSocketError(error: Error): void {
        logger.error('fx.socket.error', {
            error: error.message,
            bound: this.isBound,
        });

        if (!this.isBound) {
            this.stop('socket_error');
        }
    }

    private armIdleTimer(): void {
        if (this.idleTimer) {
            clearTimeout(this.idleTimer);
        }
        this.idleTimer = setTimeout(() => this.handleIdle(), this.options.idleTimeoutMs);
    }

    private handleIdle(): void {
        if (this.inGracePeriod) {
            return;
        }
        this.inGracePeriod = true;

        logger.warn('fx.idle', {
            idleMs: this.options.idleTimeoutMs,
            shutdownInMs: this.options.shutdownGraceMs,
        });

        this.idleTimer = setTimeout(() => this.stop('idle'), this.options.shutdownGraceMs);
    }
}
