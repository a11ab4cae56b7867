import { mkdirSync, existsSync, appendFileSync } from 'fs';
import { join } from 'path';
import { env } from '../config/env.js';

const EVENTS_LOG_FILE = join(env.LOG_DIR, 'events.jsonl');

let logsDirReady = false;

// Created on first file write
function ensureLogsDir() {
    if (logsDirReady) {
        return;
    }
    if (!existsSync(env.LOG_DIR)) {
        mkdirSync(env.LOG_DIR, { recursive: true });
    }
    logsDirReady = true;
}

/**
 * Supported log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log event structure
 */
export interface LogEvent {
    timestamp: string;
    type: string;
    level?: LogLevel;
    payload: unknown;
}

/**
 * Log level priority for threshold filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Check if a log level should be emitted based on configured threshold
 */
export function shouldLog(level: LogLevel): boolean {
    const configuredLevel = env.LOG_LEVEL;
    const configuredPriority = LOG_LEVEL_PRIORITY[configuredLevel];
    const messagePriority = LOG_LEVEL_PRIORITY[level];

    return messagePriority >= configuredPriority;
}

/**
 * JSON replacer for values JSON.stringify rejects (wire timestamps are bigint)
 */
export function jsonReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Logs an event to console and optionally to a JSONL file
 * @param type - Event type/category
 * @param payload - Event data
 * @param level - Log level (default: 'info')
 */
export function logEvent(type: string, payload: unknown, level: LogLevel = 'info') {
    // Check if this log level should be emitted
    if (!shouldLog(level)) {
        return;
    }

    const event: LogEvent = {
        timestamp: new Date().toISOString(),
        type,
        level,
        payload,
    };

    // Console output with colors based on level
    const levelColors: Record<LogLevel, string> = {
        debug: '\x1b[36m', // Cyan
        info: '\x1b[32m',  // Green
        warn: '\x1b[33m',  // Yellow
        error: '\x1b[31m', // Red
    };
    const reset = '\x1b[0m';
    const color = levelColors[level] || reset;

    console.log(
        `${color}[${event.timestamp}] [${level.toUpperCase()}] [${type}]${reset}`,
        typeof payload === 'object' ? JSON.stringify(payload, jsonReplacer, 2) : payload
    );

    // Write to JSONL file if enabled
    if (env.LOG_TO_FILE) {
        try {
            ensureLogsDir();
            const jsonLine = JSON.stringify(event, jsonReplacer) + '\n';
            appendFileSync(EVENTS_LOG_FILE, jsonLine, 'utf-8');
        } catch (error) {
            console.error('Failed to write to log file:', error);
        }
    }
}

/**
 * Convenience methods for different log levels
 */
export const logger = {
    debug: (type: string, payload: unknown) => logEvent(type, payload, 'debug'),
    info: (type: string, payload: unknown) => logEvent(type, payload, 'info'),
    warn: (type: string, payload: unknown) => logEvent(type, payload, 'warn'),
    error: (type: string, payload: unknown) => logEvent(type, payload, 'error'),
};
