import type {
    DecodedMessage,
    MalformedFrame,
    QuoteInput,
    QuoteRecord,
    SubscriberAddress,
} from './types.js';

/**
 * Quote frame layout
 *
 *   0  3  base currency   ASCII
 *   3  3  quote currency  ASCII
 *   6  4  rate            float32 LE
 *  10  8  timestamp       uint64 BE, µs since epoch
 *  18 14  reserved        zero
 */
export const FRAME_SIZE = 32;
export const HANDSHAKE_SIZE = 6;

const BASE_OFFSET = 0;
const QUOTE_OFFSET = 3;
const RATE_OFFSET = 6;
const TIMESTAMP_OFFSET = 10;
const CURRENCY_LENGTH = 3;

const MICROS_PER_SECOND = 1_000_000;

function isAscii(bytes: Buffer): boolean {
    return bytes.every(b => b <= 0x7f);
}

/**
 * Decode a message made of back-to-back 32-byte quote frames.
 * Frames with non-ASCII currency bytes are skipped; a trailing partial frame is dropped.
 */
export function decodeMessage(data: Uint8Array): DecodedMessage {
    const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    const frameCount = Math.floor(buf.length / FRAME_SIZE);
    const quotes: QuoteRecord[] = [];
    const malformed: MalformedFrame[] = [];

    for (let index = 0; index < frameCount; index++) {
        const frame = buf.subarray(index * FRAME_SIZE, (index + 1) * FRAME_SIZE);
        const base = frame.subarray(BASE_OFFSET, BASE_OFFSET + CURRENCY_LENGTH);
        const quote = frame.subarray(QUOTE_OFFSET, QUOTE_OFFSET + CURRENCY_LENGTH);

        if (!isAscii(base) || !isAscii(quote)) {
            malformed.push({ index, reason: 'non_ascii_currency' });
            continue;
        }

        quotes.push({
            baseCurrency: base.toString('ascii'),
            quoteCurrency: quote.toString('ascii'),
            rate: frame.readFloatLE(RATE_OFFSET),
            timestampMicros: frame.readBigUInt64BE(TIMESTAMP_OFFSET),
        });
    }

    return {
        quotes,
        malformed,
        trailingBytes: buf.length % FRAME_SIZE,
    };
}

export function decodeQuotes(data: Uint8Array): QuoteRecord[] {
    return decodeMessage(data).quotes;
}

/**
 * Encode quotes into one message.
 * `time` is truncated to whole microseconds; without it the current wall clock is used.
 */
export function encodeQuotes(quotes: QuoteInput[]): Buffer {
    const message = Buffer.alloc(quotes.length * FRAME_SIZE);

    quotes.forEach((quote, index) => {
        const offset = index * FRAME_SIZE;
        const base = quote.cross.slice(0, 3);
        const counter = quote.cross.slice(4, 7);

        const micros = quote.time === undefined
            ? BigInt(Date.now()) * 1000n
            : BigInt(Math.trunc(quote.time * MICROS_PER_SECOND));

        message.write(base, offset + BASE_OFFSET, CURRENCY_LENGTH, 'ascii');
        message.write(counter, offset + QUOTE_OFFSET, CURRENCY_LENGTH, 'ascii');
        message.writeFloatLE(quote.price, offset + RATE_OFFSET);
        message.writeBigUInt64BE(micros, offset + TIMESTAMP_OFFSET);
    });

    return message;
}

/**
 * Subscription handshake: IPv4 address (network order) + port (uint16 BE)
 */
export function serializeAddress(address: SubscriberAddress): Buffer {
    const octets = address.host.split('.').map(part => Number(part));
    const valid = /^\d{1,3}(\.\d{1,3}){3}$/.test(address.host) && octets.every(o => o <= 255);
    if (!valid) {
        throw new RangeError(`Not a dotted-quad IPv4 address: ${address.host}`);
    }
    if (!Number.isInteger(address.port) || address.port < 0 || address.port > 0xffff) {
        throw new RangeError(`Port out of range: ${address.port}`);
    }

    const out = Buffer.alloc(HANDSHAKE_SIZE);
    octets.forEach((octet, i) => out.writeUInt8(octet, i));
    out.writeUInt16BE(address.port, 4);
    return out;
}

export function deserializeAddress(data: Uint8Array): SubscriberAddress {
    if (data.byteLength < HANDSHAKE_SIZE) {
        throw new RangeError(`Handshake needs ${HANDSHAKE_SIZE} bytes, got ${data.byteLength}`);
    }
    const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    return {
        host: Array.from(buf.subarray(0, 4)).join('.'),
        port: buf.readUInt16BE(4),
    };
}
