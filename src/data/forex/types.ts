/**
 * Decoded quote frame
 */
export interface QuoteRecord {
    baseCurrency: string;       // USD
    quoteCurrency: string;      // EUR
    rate: number;               // Units of quote per 1 base (float32 precision)
    timestampMicros: bigint;    // Publisher timestamp, µs since epoch
}

/**
 * Quote as handed to the encoder (publisher side / fixtures)
 */
export interface QuoteInput {
    cross: string;              // "AAA/BBB"
    price: number;
    time?: number;              // Seconds since epoch, fractional
}

export type MalformedFrameReason = 'non_ascii_currency';

/**
 * Frame skipped during decoding
 */
export interface MalformedFrame {
    index: number;              // Frame position within the message
    reason: MalformedFrameReason;
}

export interface DecodedMessage {
    quotes: QuoteRecord[];
    malformed: MalformedFrame[];
    trailingBytes: number;      // Partial frame left at the end, ignored
}

/**
 * IPv4 endpoint carried in the subscription handshake
 */
export interface SubscriberAddress {
    host: string;
    port: number;
}
