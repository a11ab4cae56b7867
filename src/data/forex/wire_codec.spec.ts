import test from 'node:test';
import assert from 'node:assert/strict';

import {
    FRAME_SIZE,
    decodeMessage,
    decodeQuotes,
    deserializeAddress,
    encodeQuotes,
    serializeAddress,
} from './wire_codec.js';

test('encodeQuotes lays out one 32-byte frame per quote', () => {
    const frame = encodeQuotes([{ cross: 'USD/JPY', price: 1.5, time: 1.25 }]);

    assert.equal(frame.length, FRAME_SIZE);
    assert.equal(frame.subarray(0, 3).toString('ascii'), 'USD');
    assert.equal(frame.subarray(3, 6).toString('ascii'), 'JPY');
    // 1.5f = 0x3FC00000, little-endian
    assert.deepEqual([...frame.subarray(6, 10)], [0x00, 0x00, 0xc0, 0x3f]);
    // 1_250_000 µs = 0x1312D0, big-endian
    assert.deepEqual([...frame.subarray(10, 18)], [0, 0, 0, 0, 0, 0x13, 0x12, 0xd0]);
    assert.ok(frame.subarray(18).every(b => b === 0));
});

test('decode(encode(q)) keeps the timestamp exactly and the rate to float32', () => {
    const [quote] = decodeQuotes(encodeQuotes([{ cross: 'EUR/USD', price: 0.9, time: 1700000000.5 }]));

    assert.equal(quote.baseCurrency, 'EUR');
    assert.equal(quote.quoteCurrency, 'USD');
    assert.equal(quote.rate, Math.fround(0.9));
    assert.equal(quote.timestampMicros, 1700000000500000n);
});

test('encodeQuotes truncates sub-microsecond time', () => {
    const [quote] = decodeQuotes(encodeQuotes([{ cross: 'GBP/USD', price: 1.25, time: 1.0000015 }]));

    assert.equal(quote.timestampMicros, 1000001n);
});

test('encodeQuotes stamps quotes without time with the wall clock', () => {
    const before = BigInt(Date.now()) * 1000n;
    const [quote] = decodeQuotes(encodeQuotes([{ cross: 'GBP/USD', price: 1.25 }]));
    const after = BigInt(Date.now()) * 1000n;

    assert.ok(quote.timestampMicros >= before);
    assert.ok(quote.timestampMicros <= after);
});

test('decodeMessage ignores a trailing partial frame', () => {
    const message = Buffer.concat([
        encodeQuotes([
            { cross: 'USD/EUR', price: 0.5, time: 1 },
            { cross: 'EUR/GBP', price: 0.75, time: 2 },
        ]),
        Buffer.alloc(10),
    ]);

    const decoded = decodeMessage(message);

    assert.equal(decoded.quotes.length, 2);
    assert.equal(decoded.trailingBytes, 10);
    assert.deepEqual(decoded.malformed, []);
    assert.deepEqual(decoded.quotes.map(q => q.rate), [0.5, 0.75]);
});

test('decodeMessage skips frames with non-ASCII currency bytes', () => {
    const message = encodeQuotes([
        { cross: 'USD/EUR', price: 0.5, time: 1 },
        { cross: 'EUR/GBP', price: 0.75, time: 2 },
    ]);
    message[1] = 0xff;

    const decoded = decodeMessage(message);

    assert.deepEqual(decoded.malformed, [{ index: 0, reason: 'non_ascii_currency' }]);
    assert.equal(decoded.quotes.length, 1);
    assert.equal(decoded.quotes[0].baseCurrency, 'EUR');
    assert.equal(decoded.quotes[0].timestampMicros, 2000000n);
});

test('decodeMessage honours the byte offset of a view', () => {
    const message = encodeQuotes([
        { cross: 'USD/EUR', price: 0.5, time: 1 },
        { cross: 'EUR/GBP', price: 0.75, time: 2 },
    ]);

    const quotes = decodeQuotes(message.subarray(FRAME_SIZE));

    assert.equal(quotes.length, 1);
    assert.equal(quotes[0].quoteCurrency, 'GBP');
});

test('serializeAddress packs IPv4 and big-endian port', () => {
    const data = serializeAddress({ host: '127.0.0.1', port: 10000 });

    assert.deepEqual([...data], [127, 0, 0, 1, 0x27, 0x10]);
    assert.deepEqual(deserializeAddress(data), { host: '127.0.0.1', port: 10000 });
});

test('serializeAddress rejects hosts and ports it cannot encode', () => {
    assert.throws(() => serializeAddress({ host: 'localhost', port: 10000 }), RangeError);
    assert.throws(() => serializeAddress({ host: '10.0.0.256', port: 10000 }), RangeError);
    assert.throws(() => serializeAddress({ host: '10..0.1', port: 10000 }), RangeError);
    assert.throws(() => serializeAddress({ host: '10.0.0.1', port: 70000 }), RangeError);
});

test('deserializeAddress needs six bytes', () => {
    assert.throws(() => deserializeAddress(Buffer.alloc(5)), RangeError);
});
