// src/utils/logger.ts
import pino from "pino";
import type { DestinationStream, Logger as PinoLogger, LoggerOptions } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

// Configuration for the logger
export interface LoggerConfig {
    level?: LogLevel | "silent" | undefined;
    pretty?: boolean | undefined;
    redactPaths?: string[] | undefined;
    /** Where log lines go instead of stdout; takes precedence over `pretty`. */
    destination?: DestinationStream | undefined;
}

/** Per-logger settings; everything else comes from the shared root. */
export interface LogOptions {
    level?: LogLevel | "silent" | undefined;
}

interface Root {
    logger: PinoLogger;
    transport: DestinationStream | undefined;
}

let globalConfig: LoggerConfig = {};
let root: Root | undefined;
let generation = 0;

function resolveLevel(config: LoggerConfig): string {
    if (config.level !== undefined) return config.level;
    const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
    return fromEnv && ["debug", "info", "warn", "error", "silent"].includes(fromEnv) ? fromEnv : "info";
}

function buildRoot(config: LoggerConfig): Root {
    const options: LoggerOptions = {
        level: resolveLevel(config),
        redact: {
            paths: config.redactPaths ?? [],
            remove: true
        },
        serializers: {
            err: pino.stdSerializers.err
        },
        base: {
            service: "psm-filter-engine"
        },
        timestamp: pino.stdTimeFunctions.isoTime
    };

    if (config.destination !== undefined) {
        return { logger: pino(options, config.destination), transport: undefined };
    }

    // Pretty output only on request; the transport runs in a worker thread
    if (config.pretty ?? process.env.LOG_PRETTY === "true") {
        const transport = pino.transport({
            target: "pino-pretty",
            options: {
                colorize: true,
                translateTime: "SYS:standard",
                ignore: "pid,hostname",
                messageFormat: "[{name}] {msg}"
            }
        });
        return { logger: pino(options, transport), transport };
    }

    return { logger: pino(options), transport: undefined };
}

function rootLogger(): PinoLogger {
    root ??= buildRoot(globalConfig);
    return root.logger;
}

function closeRoot(): void {
    const transport = root?.transport;
    if (root !== undefined && transport !== undefined) {
        root.logger.flush();
        if ("end" in transport && typeof transport.end === "function") transport.end();
    }
    root = undefined;
}

/**
 * Named logger over pino. Messages take an optional structured context which
 * is merged into the log line. Every Log is a child of one shared root, taken
 * on first use and again after configureLogging replaces the root.
 */
export class Log {
    private instance: PinoLogger | undefined;
    private builtFor = -1;

    private constructor(
        readonly name: string,
        private readonly options: LogOptions | undefined,
        private readonly bindings: Record<string, unknown> | undefined
    ) {}

    static getLog(name: string, options?: LogOptions | undefined): Log {
        return new Log(name, options, undefined);
    }

    private get pino(): PinoLogger {
        if (this.instance === undefined || this.builtFor !== generation) {
            const level = this.options?.level;
            this.instance = rootLogger().child(
                { name: this.name, ...this.bindings },
                level === undefined ? {} : { level }
            );
            this.builtFor = generation;
        }
        return this.instance;
    }

    isLoggable(level: LogLevel): boolean {
        return this.pino.isLevelEnabled(level);
    }

    debug(message: string, context?: Record<string, unknown> | undefined): void {
        this.write("debug", message, context);
    }

    info(message: string, context?: Record<string, unknown> | undefined): void {
        this.write("info", message, context);
    }

    warn(message: string, context?: Record<string, unknown> | undefined): void {
        this.write("warn", message, context);
    }

    error(message: string, context?: Record<string, unknown> | undefined): void {
        this.write("error", message, context);
    }

    /**
     * Create child logger with additional bindings.
     */
    child(bindings: Record<string, unknown>): Log {
        return new Log(this.name, this.options, { ...this.bindings, ...bindings });
    }

    private write(level: LogLevel, message: string, context: Record<string, unknown> | undefined): void {
        if (!this.pino.isLevelEnabled(level)) return;
        if (context === undefined) {
            this.pino[level](message);
        } else {
            this.pino[level](context, message);
        }
    }
}

export function getLog(name: string, options?: LogOptions | undefined): Log {
    return Log.getLog(name, options);
}

/**
 * Replaces the global logger configuration. The previous root is flushed and
 * its transport ended; existing loggers move to the new root on next use.
 */
export function configureLogging(config: LoggerConfig): void {
    closeRoot();
    globalConfig = { ...config };
    generation++;
}
