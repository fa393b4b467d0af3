/**
 * Shared Logger - Structured logging for Sigil services
 *
 * Provides:
 * 1. Structured JSON log lines with correlation IDs and masking
 * 2. Decision audit log (JSONL) with size rotation and gzip of aged files
 */

import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";
import * as zlib from "zlib";
import { promisify } from "util";

const gzip = promisify(zlib.gzip);

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    FATAL = 4,
}

export type LogMetadata = Record<string, unknown>;

/**
 * Structured log entry
 */
export interface LogEntry {
    timestamp: string;
    level: string;
    message: string;
    correlationId?: string;
    component?: string;
    operation?: string;
    duration?: number;
    metadata?: LogMetadata;
    error?: {
        name: string;
        message: string;
        stack?: string;
        code?: string | number;
    };
}

/**
 * Decision fields supplied by the caller
 */
export interface DecisionLogInput {
    symbol: string;
    context: string;
    decision: string;
    allowed: boolean;
    evaluated: boolean;
    reason: string;
    direction?: string;
    technicalScore?: number;
    matchRatio?: number;
    grade?: string;
    entryScore?: number;
    reasons?: string[];
    correlationId?: string;
}

/**
 * Decision audit entry, one line of decisions.jsonl
 */
export interface DecisionLogEntry extends DecisionLogInput {
    timestamp: string;
    service: string;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    level: LogLevel;
    component: string;
    enableConsole: boolean;
    enableFile: boolean;
    filePath?: string;
    enablePerformanceLogging: boolean;
    sensitiveFields: string[];
    maxStackTraceLines: number;
    // Decision audit log
    enableDecisionLogging?: boolean;
    decisionLogPath?: string;
    maxDecisionLogSize?: number;
    maxDecisionLogAgeMs?: number;
}

/**
 * Performance timer for operation tracking
 */
export interface PerformanceTimer {
    operation: string;
    startTime: number;
    correlationId?: string;
    metadata?: LogMetadata;
}

const DEFAULT_MAX_LOG_SIZE = 10 * 1024 * 1024; // 10 MB
const DEFAULT_MAX_LOG_AGE = 30 * 24 * 60 * 60 * 1000; // 30 days

function isLogLevelName(value: string): value is keyof typeof LogLevel {
    return value in LogLevel && Number.isNaN(Number(value));
}

function errorCode(error: Error): string | number | undefined {
    const candidate: unknown = Reflect.get(error, "code") ??
        Reflect.get(error, "statusCode");
    return typeof candidate === "string" || typeof candidate === "number"
        ? candidate
        : undefined;
}

/**
 * Shared structured logger
 */
export class Logger {
    private config: LoggerConfig;
    private static instances: Map<string, Logger> = new Map();
    private activeTimers: Map<string, PerformanceTimer> = new Map();

    constructor(config: LoggerConfig) {
        this.config = config;

        if (this.config.enableDecisionLogging && this.config.decisionLogPath) {
            this.initDecisionLog();
        }
    }

    /**
     * Create logger configuration from environment variables
     */
    static createConfigFromEnv(
        component: string,
        env: NodeJS.ProcessEnv = process.env,
    ): LoggerConfig {
        const logLevelStr = (env.LOG_LEVEL || "INFO").toUpperCase();
        const logLevel = isLogLevelName(logLevelStr)
            ? LogLevel[logLevelStr]
            : LogLevel.INFO;

        return {
            level: logLevel,
            component,
            enableConsole: env.LOG_ENABLE_CONSOLE !== "false",
            enableFile: env.LOG_ENABLE_FILE === "true",
            filePath: env.LOG_FILE_PATH,
            enablePerformanceLogging: env.LOG_ENABLE_PERFORMANCE !== "false",
            sensitiveFields: (env.LOG_SENSITIVE_FIELDS ||
                "password,secret,token,apikey,authorization").split(","),
            maxStackTraceLines: parseInt(env.LOG_MAX_STACK_LINES || "10", 10),
            enableDecisionLogging: Boolean(env.DECISION_LOG_PATH),
            decisionLogPath: env.DECISION_LOG_PATH,
        };
    }

    /**
     * Get or create the logger for a component
     */
    static getInstance(component: string = "shared"): Logger {
        let instance = Logger.instances.get(component);
        if (!instance) {
            instance = new Logger(Logger.createConfigFromEnv(component));
            Logger.instances.set(component, instance);
        }
        return instance;
    }

    /**
     * Drop cached instances (tests)
     */
    static resetInstances(): void {
        Logger.instances.clear();
    }

    static generateCorrelationId(): string {
        return randomUUID();
    }

    // ==========================================
    // Structured logging
    // ==========================================

    private isSensitiveKey(key: string): boolean {
        const lowerKey = key.toLowerCase();
        return this.config.sensitiveFields.some((field) =>
            lowerKey.includes(field.toLowerCase())
        );
    }

    private maskSensitiveData(value: unknown): unknown {
        if (value === null || value === undefined) return value;
        if (Array.isArray(value)) {
            return value.map((item) => this.maskSensitiveData(item));
        }
        if (typeof value === "object") {
            const masked: Record<string, unknown> = {};
            for (const [key, inner] of Object.entries(value)) {
                masked[key] = this.isSensitiveKey(key)
                    ? "[MASKED]"
                    : this.maskSensitiveData(inner);
            }
            return masked;
        }
        return value;
    }

    private maskMetadata(metadata: LogMetadata): LogMetadata {
        const masked: LogMetadata = {};
        for (const [key, value] of Object.entries(metadata)) {
            masked[key] = this.isSensitiveKey(key)
                ? "[MASKED]"
                : this.maskSensitiveData(value);
        }
        return masked;
    }

    private formatError(error: Error): LogEntry["error"] {
        const stackLines = error.stack?.split("\n").slice(
            0,
            this.config.maxStackTraceLines,
        );
        return {
            name: error.name,
            message: error.message,
            stack: stackLines?.join("\n"),
            code: errorCode(error),
        };
    }

    private createLogEntry(
        level: LogLevel,
        message: string,
        correlationId?: string,
        operation?: string,
        duration?: number,
        metadata?: LogMetadata,
        error?: Error,
    ): LogEntry {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: LogLevel[level],
            message,
            component: this.config.component,
        };
        if (correlationId) entry.correlationId = correlationId;
        if (operation) entry.operation = operation;
        if (duration !== undefined) entry.duration = duration;
        if (metadata) entry.metadata = this.maskMetadata(metadata);
        if (error) entry.error = this.formatError(error);
        return entry;
    }

    private writeLog(entry: LogEntry): void {
        const logString = JSON.stringify(entry);

        if (this.config.enableConsole) {
            switch (entry.level) {
                case "DEBUG":
                    console.debug(logString);
                    break;
                case "INFO":
                    console.info(logString);
                    break;
                case "WARN":
                    console.warn(logString);
                    break;
                case "ERROR":
                case "FATAL":
                    console.error(logString);
                    break;
                default:
                    console.log(logString);
            }
        }

        if (this.config.enableFile && this.config.filePath) {
            try {
                fs.mkdirSync(path.dirname(this.config.filePath), {
                    recursive: true,
                });
                fs.appendFileSync(this.config.filePath, logString + "\n");
            } catch (error) {
                console.error("Failed to write to log file:", error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return level >= this.config.level;
    }

    private log(
        level: LogLevel,
        message: string,
        correlationId?: string,
        metadata?: LogMetadata,
        error?: Error,
    ): void {
        if (!this.shouldLog(level)) return;
        this.writeLog(
            this.createLogEntry(
                level,
                message,
                correlationId,
                undefined,
                undefined,
                metadata,
                error,
            ),
        );
    }

    debug(message: string, correlationId?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.DEBUG, message, correlationId, metadata);
    }

    info(message: string, correlationId?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.INFO, message, correlationId, metadata);
    }

    warn(message: string, correlationId?: string, metadata?: LogMetadata): void {
        this.log(LogLevel.WARN, message, correlationId, metadata);
    }

    error(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        this.log(LogLevel.ERROR, message, correlationId, metadata, error);
    }

    fatal(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        this.log(LogLevel.FATAL, message, correlationId, metadata, error);
    }

    // Performance Logging
    startTimer(
        operation: string,
        correlationId?: string,
        metadata?: LogMetadata,
    ): string {
        const timerId = randomUUID();
        this.activeTimers.set(timerId, {
            operation,
            startTime: Date.now(),
            correlationId,
            metadata,
        });
        if (this.config.enablePerformanceLogging) {
            this.debug(`Started operation: ${operation}`, correlationId, {
                timerId,
                ...metadata,
            });
        }
        return timerId;
    }

    endTimer(timerId: string, additionalMetadata?: LogMetadata): number | null {
        const timer = this.activeTimers.get(timerId);
        if (!timer) {
            this.warn(`Timer not found: ${timerId}`);
            return null;
        }
        const duration = Date.now() - timer.startTime;
        this.activeTimers.delete(timerId);
        if (
            this.config.enablePerformanceLogging &&
            this.shouldLog(LogLevel.INFO)
        ) {
            this.writeLog(this.createLogEntry(
                LogLevel.INFO,
                `Completed operation: ${timer.operation}`,
                timer.correlationId,
                timer.operation,
                duration,
                { timerId, ...timer.metadata, ...additionalMetadata },
            ));
        }
        return duration;
    }

    logHttpRequest(
        method: string,
        url: string,
        statusCode: number,
        duration: number,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        const level = statusCode >= 400 ? LogLevel.WARN : LogLevel.DEBUG;
        if (!this.shouldLog(level)) return;

        this.writeLog(this.createLogEntry(
            level,
            `HTTP ${method} ${url} - ${statusCode}`,
            correlationId,
            "http_request",
            duration,
            { method, url, statusCode, ...metadata },
        ));
    }

    logCacheOperation(
        operation: string,
        key: string,
        hit: boolean,
        correlationId?: string,
    ): void {
        if (!this.shouldLog(LogLevel.DEBUG)) return;
        this.writeLog(this.createLogEntry(
            LogLevel.DEBUG,
            `Cache ${operation} for ${key} - ${hit ? "HIT" : "MISS"}`,
            correlationId,
            "cache_operation",
            undefined,
            { operation, key, hit },
        ));
    }

    // ==========================================
    // Decision audit log
    // ==========================================

    private initDecisionLog(): void {
        const logPath = this.config.decisionLogPath;
        if (!logPath) return;
        try {
            fs.mkdirSync(path.dirname(logPath), { recursive: true });
            if (!fs.existsSync(logPath)) {
                fs.writeFileSync(logPath, "");
            }
        } catch (error) {
            console.error(
                `Failed to initialize decision log at ${logPath}:`,
                error,
            );
        }
    }

    /**
     * Append a decision to decisions.jsonl
     */
    logDecision(entry: DecisionLogInput): void {
        const logPath = this.config.decisionLogPath;
        if (!this.config.enableDecisionLogging || !logPath) return;

        try {
            const line: DecisionLogEntry = {
                timestamp: new Date().toISOString(),
                service: this.config.component,
                ...entry,
            };
            fs.appendFileSync(logPath, JSON.stringify(line) + "\n");
            this.checkRotation(logPath);
        } catch (error) {
            console.error("Failed to write decision log entry:", error);
        }
    }

    private checkRotation(logPath: string): void {
        const maxSize = this.config.maxDecisionLogSize ?? DEFAULT_MAX_LOG_SIZE;
        try {
            if (fs.statSync(logPath).size > maxSize) {
                this.rotateLog(logPath);
            }
        } catch (error) {
            console.error("Failed to stat decision log:", error);
            return;
        }
        this.compressOldLogs(logPath).catch((err) => {
            console.error("Failed to compress old logs:", err);
        });
    }

    private rotateLog(logPath: string): void {
        try {
            const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
            const rotatedPath = logPath.replace(
                /\.jsonl$/,
                `-${timestamp}.jsonl`,
            );
            fs.renameSync(logPath, rotatedPath);
            fs.writeFileSync(logPath, "");
            this.info(`Decision log rotated: ${rotatedPath}`);
        } catch (error) {
            console.error("Failed to rotate log:", error);
        }
    }

    /**
     * Gzip rotated decision logs older than the configured age
     */
    async compressOldLogs(logPath: string): Promise<number> {
        const maxAge = this.config.maxDecisionLogAgeMs ?? DEFAULT_MAX_LOG_AGE;
        const logDir = path.dirname(logPath);
        const current = path.basename(logPath);
        const now = Date.now();
        let compressed = 0;

        for (const file of fs.readdirSync(logDir)) {
            if (file === current || !file.endsWith(".jsonl")) continue;

            const filePath = path.join(logDir, file);
            const stats = fs.statSync(filePath);
            if (now - stats.mtimeMs > maxAge) {
                const content = fs.readFileSync(filePath);
                fs.writeFileSync(filePath + ".gz", await gzip(content));
                fs.unlinkSync(filePath);
                compressed++;
            }
        }
        return compressed;
    }

    queryDecisions(
        filter?: (entry: DecisionLogEntry) => boolean,
    ): DecisionLogEntry[] {
        const logPath = this.config.decisionLogPath;
        if (!logPath || !fs.existsSync(logPath)) return [];

        const entries: DecisionLogEntry[] = [];
        const content = fs.readFileSync(logPath, "utf-8");
        for (const line of content.split("\n")) {
            if (!line.trim()) continue;
            try {
                const parsed: DecisionLogEntry = JSON.parse(line);
                entries.push(parsed);
            } catch {
                this.warn("Skipping malformed decision log line", undefined, {
                    line: line.slice(0, 120),
                });
            }
        }
        return filter ? entries.filter(filter) : entries;
    }

    getConfig(): LoggerConfig {
        return { ...this.config };
    }

    setLogLevel(level: LogLevel): void {
        this.config.level = level;
        this.info(`Log level changed to ${LogLevel[level]}`);
    }

    getActiveTimerCount(): number {
        return this.activeTimers.size;
    }

    /**
     * Clear all active timers (useful for testing)
     */
    clearTimers(): void {
        this.activeTimers.clear();
    }
}
