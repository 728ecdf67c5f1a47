import type { MessageCallback } from './logger';

export const appendNewline: MessageCallback = ({ message }) =>
    message.endsWith('\n') ? message : `${message}\n`;

// one record = one line in the file
export const escapeNewlines: MessageCallback = ({ message }) => message.replace(/\r?\n/g, '\\n');

export const levelPrefix: MessageCallback = ({ message, level }) => `${level.toUpperCase()} ${message}`;

export function timestampPrefix(now: () => number = () => Date.now()): MessageCallback {
    return ({ message }) => `[${new Date(now()).toISOString()}] ${message}`;
}

/**
 * Prefixes `key=value` pairs, e.g. contextPrefix({ runId: 'r1' }) → "runId=r1 <message>".
 */
export function contextPrefix(fields: Record<string, string>): MessageCallback {
    const prefix = Object.entries(fields)
        .map(([key, value]) => `${key}=${value}`)
        .join(' ');
    return ({ message }) => (prefix ? `${prefix} ${message}` : message);
}
