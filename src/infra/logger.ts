// Централизованный модуль логирования: вывод в консоль плюс реестр именованных sink'ов.
// Каждая запись проходит глобальную цепочку callbacks один раз, затем каждый sink,
// чье окно уровней ее принимает, применяет свои callbacks и получает один write().

import EventEmitter from 'eventemitter3';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

export interface LogEntry {
    level: LogLevel;
    message: string;
    ts: number; // unix ms
    iso: string;
}

export interface MessageCallbackInput {
    message: string;
    level: LogLevel;
}

export type MessageCallback = (input: MessageCallbackInput) => string;

export interface LogSink {
    readonly kind: string;
    write(entry: LogEntry, formatted: string): void;
    flush?(): void | Promise<void>;
    close?(): void | Promise<void>;
}

export interface SinkRouteOptions {
    name?: string;
    minLevel?: LogLevel;
    maxLevel?: LogLevel;
    callbacks?: MessageCallback | MessageCallback[];
}

interface SinkRoute {
    name: string;
    sink: LogSink;
    minLevel: LogLevel;
    maxLevel: LogLevel;
    callbacks: MessageCallback[];
}

export type ConsoleMode = 'ui' | 'verbose';
export type ConsoleWriter = (entry: LogEntry, formatted: string) => void;

/**
 * What happens when a sink throws from write():
 * - throw: the error reaches the caller of log()
 * - disable: the sink is dropped from routing and closed with the logger
 */
export type SinkErrorPolicy = 'throw' | 'disable';

export type LoggerEventMap = {
    'sink:added': [name: string, sink: LogSink];
    'sink:removed': [name: string, sink: LogSink];
    'sink:disabled': [name: string, error: unknown];
    closed: [];
};

export interface LoggerOptions {
    level?: LogLevel;
    now?: () => number;
}

const timestamp = (ts: number): string => new Date(ts).toLocaleString();

export function describeError(err: unknown): string {
    if (err instanceof Error) {
        return err.stack?.split('\n').slice(0, 3).join('\n') ?? err.message;
    }
    return String(err);
}

export function formatLine(entry: LogEntry): string {
    return `[${timestamp(entry.ts)}] ${entry.level.toUpperCase()}: ${entry.message}`;
}

const writeToConsole: ConsoleWriter = (entry, formatted) => {
    if (entry.level === 'error') console.error(formatted);
    else console.log(formatted);
};

function toList(callbacks: MessageCallback | MessageCallback[] | undefined): MessageCallback[] {
    if (!callbacks) return [];
    return Array.isArray(callbacks) ? [...callbacks] : [callbacks];
}

function applyCallbacks(callbacks: readonly MessageCallback[], message: string, level: LogLevel): string {
    let result = message;
    for (const callback of callbacks) {
        result = callback({ message: result, level });
    }
    return result;
}

function envLevel(): LogLevel {
    const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
    return isLogLevel(raw) ? raw : 'info';
}

export class Logger extends EventEmitter<LoggerEventMap> {
    private level: LogLevel;
    private display = true;
    private consoleMode: ConsoleMode = 'verbose';
    private consoleWriter: ConsoleWriter = writeToConsole;
    private routes: SinkRoute[] = [];
    private retired: LogSink[] = [];
    private callbacks: MessageCallback[] = [];
    private sinkErrorPolicy: SinkErrorPolicy = 'throw';
    private autoNameSeq = 0;
    private shutdownHooksInstalled = false;
    private readonly now: () => number;

    constructor(options: LoggerOptions = {}) {
        super();
        this.level = options.level ?? envLevel();
        this.now = options.now ?? (() => Date.now());
    }

    // -----------------------------------------------------------------------
    // Settings
    // -----------------------------------------------------------------------

    getLevel(): LogLevel {
        return this.level;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    isLevelEnabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
    }

    isDisplayEnabled(): boolean {
        return this.display;
    }

    setDisplay(enabled: boolean): void {
        this.display = enabled;
    }

    getConsoleMode(): ConsoleMode {
        return this.consoleMode;
    }

    setConsoleMode(mode: ConsoleMode): void {
        this.consoleMode = mode;
    }

    /**
     * Replaces the console writer, e.g. to keep an interactive prompt intact.
     */
    setSink(writer: ConsoleWriter): void {
        this.consoleWriter = writer;
    }

    resetSinkToConsole(): void {
        this.consoleWriter = writeToConsole;
    }

    setCallbacks(callbacks: MessageCallback | MessageCallback[]): void {
        this.callbacks = toList(callbacks);
    }

    getSinkErrorPolicy(): SinkErrorPolicy {
        return this.sinkErrorPolicy;
    }

    setSinkErrorPolicy(policy: SinkErrorPolicy): void {
        this.sinkErrorPolicy = policy;
    }

    // -----------------------------------------------------------------------
    // Sink registry
    // -----------------------------------------------------------------------

    addSink(sink: LogSink, options: SinkRouteOptions = {}): string {
        const name = options.name ?? `${sink.kind}-${++this.autoNameSeq}`;
        if (this.hasSink(name)) {
            throw new Error(`Log sink '${name}' is already registered`);
        }
        const minLevel = options.minLevel ?? 'debug';
        const maxLevel = options.maxLevel ?? 'error';
        if (LEVEL_RANK[minLevel] > LEVEL_RANK[maxLevel]) {
            throw new Error(`Log sink '${name}': minLevel ${minLevel} is above maxLevel ${maxLevel}`);
        }

        this.routes.push({ name, sink, minLevel, maxLevel, callbacks: toList(options.callbacks) });
        this.emit('sink:added', name, sink);
        return name;
    }

    /**
     * Unregisters a sink without closing it; the caller owns it again.
     */
    removeSink(name: string): LogSink | undefined {
        const route = this.routes.find((r) => r.name === name);
        if (!route) return undefined;
        this.routes = this.routes.filter((r) => r !== route);
        this.emit('sink:removed', name, route.sink);
        return route.sink;
    }

    /**
     * Replaces all routes. Replaced sinks that are not passed in again stay
     * owned by the logger and are closed by close().
     */
    setSinks(sinks: LogSink[]): void {
        const replaced = this.routes;
        this.routes = [];
        for (const route of replaced) {
            if (!sinks.includes(route.sink)) this.retired.push(route.sink);
            this.emit('sink:removed', route.name, route.sink);
        }
        for (const sink of sinks) {
            this.addSink(sink);
        }
    }

    hasSink(name: string): boolean {
        return this.routes.some((r) => r.name === name);
    }

    getSink(name: string): LogSink | undefined {
        return this.routes.find((r) => r.name === name)?.sink;
    }

    sinkNames(): string[] {
        return this.routes.map((r) => r.name);
    }

    // -----------------------------------------------------------------------
    // Records
    // -----------------------------------------------------------------------

    debug(message: string): void {
        this.log('debug', message);
    }

    info(message: string): void {
        this.log('info', message);
    }

    warn(message: string): void {
        this.log('warn', message);
    }

    error(message: string, err?: unknown): void {
        this.log('error', err === undefined ? message : `${message}\n${describeError(err)}`);
    }

    /**
     * Console-only line (status output, help). Sinks never see it.
     */
    ui(message: string): void {
        if (!this.display) return;
        const entry = this.makeEntry('info', message);
        this.consoleWriter(entry, message);
    }

    log(level: LogLevel, message: string): void {
        if (!this.isLevelEnabled(level)) return;
        const shaped = applyCallbacks(this.callbacks, message, level);
        this.writeConsole(level, shaped);

        for (const route of [...this.routes]) {
            if (!this.accepts(route, level)) continue;
            this.deliver(route, level, shaped);
        }
    }

    /**
     * Sends a record to one named sink only. Returns false when the sink is
     * unknown or its level window rejects the record.
     */
    logTo(name: string, level: LogLevel, message: string): boolean {
        const route = this.routes.find((r) => r.name === name);
        if (!route || !this.isLevelEnabled(level) || !this.accepts(route, level)) return false;
        this.deliver(route, level, applyCallbacks(this.callbacks, message, level));
        return true;
    }

    // -----------------------------------------------------------------------
    // Shutdown
    // -----------------------------------------------------------------------

    async flush(): Promise<void> {
        for (const route of [...this.routes]) {
            await route.sink.flush?.();
        }
    }

    /**
     * Closes every registered (and disabled) sink exactly once and empties
     * the registry. Close failures are collected and rethrown together.
     */
    async close(): Promise<void> {
        const sinks = [...this.routes.map((r) => r.sink), ...this.retired];
        this.routes = [];
        this.retired = [];

        const errors: unknown[] = [];
        for (const sink of sinks) {
            try {
                await sink.close?.();
            } catch (err) {
                errors.push(err);
            }
        }
        this.emit('closed');

        if (errors.length === 1) throw errors[0];
        if (errors.length > 1) throw new AggregateError(errors, `${errors.length} log sinks failed to close`);
    }

    /**
     * SIGINT/SIGTERM close the logger once, then exit with 130/143.
     * Returns a function that removes the handlers again.
     */
    installShutdownHooks(exit: (code: number) => void = (code) => process.exit(code)): () => void {
        if (this.shutdownHooksInstalled) return () => {};
        this.shutdownHooksInstalled = true;
        let shuttingDown = false;

        const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
            if (shuttingDown) return;
            shuttingDown = true;
            try {
                await this.close();
            } catch (err) {
                process.stderr.write(`${formatLine(this.makeEntry('error', `log shutdown failed: ${describeError(err)}`))}\n`);
            }
            exit(signal === 'SIGINT' ? 130 : 143);
        };

        const onSigint = (): void => void shutdown('SIGINT');
        const onSigterm = (): void => void shutdown('SIGTERM');
        process.once('SIGINT', onSigint);
        process.once('SIGTERM', onSigterm);

        return () => {
            process.off('SIGINT', onSigint);
            process.off('SIGTERM', onSigterm);
            this.shutdownHooksInstalled = false;
        };
    }

    // -----------------------------------------------------------------------
    // Internals
    // -----------------------------------------------------------------------

    private makeEntry(level: LogLevel, message: string): LogEntry {
        const ts = this.now();
        return { level, message, ts, iso: new Date(ts).toISOString() };
    }

    private accepts(route: SinkRoute, level: LogLevel): boolean {
        const rank = LEVEL_RANK[level];
        return rank >= LEVEL_RANK[route.minLevel] && rank <= LEVEL_RANK[route.maxLevel];
    }

    private writeConsole(level: LogLevel, message: string): void {
        if (!this.display) return;
        // в режиме ui консоль только для ui() и warn/error
        if (this.consoleMode === 'ui' && LEVEL_RANK[level] < LEVEL_RANK.warn) return;
        const entry = this.makeEntry(level, message);
        this.consoleWriter(entry, formatLine(entry));
    }

    private deliver(route: SinkRoute, level: LogLevel, message: string): void {
        const entry = this.makeEntry(level, applyCallbacks(route.callbacks, message, level));
        try {
            route.sink.write(entry, formatLine(entry));
        } catch (err) {
            if (this.sinkErrorPolicy === 'throw') throw err;
            this.disable(route, err);
        }
    }

    private disable(route: SinkRoute, err: unknown): void {
        this.routes = this.routes.filter((r) => r !== route);
        this.retired.push(route.sink);
        this.emit('sink:disabled', route.name, err);
        const entry = this.makeEntry('error', `log sink '${route.name}' disabled: ${describeError(err)}`);
        process.stderr.write(`${formatLine(entry)}\n`);
    }
}

export const logger = new Logger();
