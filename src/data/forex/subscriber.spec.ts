import test from 'node:test';
import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';

import { ForexSubscriber, type DatagramSocket, type ForexSubscriberOptions } from './subscriber.js';
import { encodeQuotes } from './wire_codec.js';
import { ArbitrageEngine } from '../../strategy/arbitrage_engine.js';

interface SentDatagram {
    msg: Uint8Array;
    port: number;
    address: string;
}

class FakeSocket extends EventEmitter implements DatagramSocket {
    public bound: { port: number; address: string } | null = null;
    public sent: SentDatagram[] = [];
    public closed = false;

    constructor(private readonly completeBind = true) {
        super();
    }

    bind(port: number, address: string, callback: () => void): void {
        this.bound = { port, address };
        if (this.completeBind) {
            callback();
        }
    }

    send(msg: Uint8Array, port: number, address: string, callback: (error: Error | null) => void): void {
        this.sent.push({ msg, port, address });
        callback(null);
    }

    close(): void {
        this.closed = true;
    }
}

function options(socket: FakeSocket, overrides: Partial<ForexSubscriberOptions> = {}): Partial<ForexSubscriberOptions> {
    return {
        providerHost: 'localhost',
        providerPort: 10203,
        listenHost: '127.0.0.1',
        listenPort: 10000,
        idleTimeoutMs: 20,
        shutdownGraceMs: 20,
        subscriptionMs: 60_000,
        createSocket: () => socket,
        ...overrides,
    };
}

function newEngine(): ArbitrageEngine {
    return new ArbitrageEngine({ anchor: 'USD', expiryMs: 1500, startingAmount: 100 });
}

test('subscribes, feeds datagrams to the engine and shuts down when idle', async () => {
    const socket = new FakeSocket();
    const engine = newEngine();
    const subscriber = new ForexSubscriber(engine, options(socket));

    subscriber.start();

    assert.deepEqual(socket.bound, { port: 10000, address: '127.0.0.1' });
    assert.equal(socket.sent.length, 1);
    assert.deepEqual([...socket.sent[0].msg], [127, 0, 0, 1, 0x27, 0x10]);
    assert.equal(socket.sent[0].port, 10203);
    assert.equal(socket.sent[0].address, 'localhost');

    socket.emit('message', encodeQuotes([
        { cross: 'USD/EUR', price: 1.0, time: 1 },
        { cross: 'EUR/GBP', price: 1.0, time: 1 },
        { cross: 'GBP/USD', price: 1.05, time: 1 },
    ]));

    assert.ok(Math.abs(engine.sessionProfit - 5) < 1e-4);

    assert.equal(await subscriber.done(), 'idle');
    assert.equal(socket.closed, true);
});

test('stops when the subscription phase elapses', async () => {
    const socket = new FakeSocket();
    const subscriber = new ForexSubscriber(newEngine(), options(socket, {
        idleTimeoutMs: 5_000,
        subscriptionMs: 10,
    }));

    subscriber.start();

    assert.equal(await subscriber.done(), 'subscription_elapsed');
    assert.equal(socket.closed, true);
});

test('a socket error before binding stops the subscriber', async () => {
    const socket = new FakeSocket(false);
    const subscriber = new ForexSubscriber(newEngine(), options(socket));

    subscriber.start();
    socket.emit('error', new Error('EADDRINUSE'));

    assert.equal(await subscriber.done(), 'socket_error');
    assert.equal(socket.sent.length, 0);
});

test('start and stop are idempotent', async () => {
    let created = 0;
    const socket = new FakeSocket();
    const subscriber = new ForexSubscriber(newEngine(), options(socket, {
        createSocket: () => {
            created++;
            return socket;
        },
    }));

    subscriber.start();
    subscriber.start();
    subscriber.stop('signal');
    subscriber.stop('idle');

    assert.equal(created, 1);
    assert.equal(await subscriber.done(), 'signal');
});

test('a message during the grace period resets the idle timer', async () => {
    const socket = new FakeSocket();
    const subscriber = new ForexSubscriber(newEngine(), options(socket, {
        idleTimeoutMs: 50,
        shutdownGraceMs: 100,
    }));

    subscriber.start();

    // Idle warning at 50ms, shutdown would follow at 150ms
    await delay(80);
    socket.emit('message', encodeQuotes([{ cross: 'USD/EUR', price: 0.9, time: 1 }]));

    // Re-armed at 80ms: warning at 130ms, shutdown at 230ms
    await delay(110);
    assert.equal(socket.closed, false);

    assert.equal(await subscriber.done(), 'idle');
    assert.equal(socket.closed, true);
});

test('datagrams longer than the buffer size are cut before decoding', () => {
    const socket = new FakeSocket();
    const engine = newEngine();
    const subscriber = new ForexSubscriber(engine, options(socket, { bufferSize: 64 }));

    subscriber.start();
    socket.emit('message', encodeQuotes([
        { cross: 'USD/EUR', price: 1.0, time: 1 },
        { cross: 'EUR/GBP', price: 1.0, time: 1 },
        { cross: 'GBP/USD', price: 1.05, time: 1 },
    ]));

    assert.equal(engine.quotes.size, 2);
    assert.ok(engine.quotes.has('USD/EUR'));
    assert.ok(engine.quotes.has('EUR/GBP'));
    assert.ok(!engine.quotes.has('GBP/USD'));
    assert.equal(engine.sessionProfit, 0);

    subscriber.stop('signal');
});
