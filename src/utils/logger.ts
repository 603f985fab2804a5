/**
 * iotdb-mcp - Structured Logger
 *
 * Centralized logging with RFC 5424 severity levels and structured output.
 * Lines go to stderr (stdout carries the MCP stdio transport); records are
 * also forwarded to the connected MCP client once a server is attached.
 *
 * Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
 * Example: [2025-06-01T08:00:00.000Z] [ERROR] [QUERY] [QUERY_ERROR] Query failed {"tool":"select_query"}
 */

// Server class is marked deprecated but McpServer.server exposes it for sendLoggingMessage()
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';

/**
 * RFC 5424 syslog severity levels
 * @see https://datatracker.ietf.org/doc/html/rfc5424#section-6.2.1
 */
export type LogLevel =
    | 'debug'       // 7
    | 'info'        // 6
    | 'notice'      // 5
    | 'warning'     // 4
    | 'error'       // 3
    | 'critical'    // 2
    | 'alert'       // 1
    | 'emergency';  // 0

export const LOG_LEVELS: readonly LogLevel[] = [
    'debug',
    'info',
    'notice',
    'warning',
    'error',
    'critical',
    'alert',
    'emergency'
];

/**
 * Module identifiers for log categorization
 */
export type LogModule =
    | 'SERVER'      // MCP server lifecycle
    | 'ADAPTER'     // Dialect adapters
    | 'TOOLS'       // Tool execution
    | 'TRANSPORT'   // stdio transport
    | 'QUERY'       // Statement execution
    | 'POOL'        // Session pool
    | 'CLIENT'      // IoTDB REST client
    | 'CLI';        // Command line interface

/**
 * Structured log context
 */
export interface LogContext {
    /** Module identifier */
    module?: LogModule;
    /** Module-prefixed error/event code (e.g., POOL_EXHAUSTED) */
    code?: string;
    /** Operation being performed (e.g., executeQueryStatement) */
    operation?: string;
    /** Request identifier for tracing */
    requestId?: string;
    /** Error stack trace */
    stack?: string;
    /** Additional context fields */
    [key: string]: unknown;
}

interface LogEntry {
    level: LogLevel;
    module: LogModule;
    code?: string | undefined;
    message: string;
    timestamp: string;
    context?: LogContext | undefined;
}

/**
 * Type guard for the accepted level names
 */
export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

class Logger {
    private minLevel: LogLevel = 'info';
    // eslint-disable-next-line @typescript-eslint/no-deprecated
    private mcpServer: Server | null = null;
    private loggerName = 'iotdb-mcp';

    /**
     * Lower number = higher severity
     */
    private readonly levelPriority: Record<LogLevel, number> = {
        emergency: 0,
        alert: 1,
        critical: 2,
        error: 3,
        warning: 4,
        notice: 5,
        info: 6,
        debug: 7
    };

    /**
     * Keys whose values never reach a log line
     */
    private readonly sensitiveKeys: ReadonlySet<string> = new Set([
        'password',
        'secret',
        'token',
        'authorization',
        'credential',
        'credentials'
    ]);

    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    getLevel(): LogLevel {
        return this.minLevel;
    }

    /**
     * Attach the MCP server; subsequent records are also sent to the client
     */
    // eslint-disable-next-line @typescript-eslint/no-deprecated
    setMcpServer(server: Server | null): void {
        this.mcpServer = server;
    }

    setLoggerName(name: string): void {
        this.loggerName = name;
    }

    private shouldLog(level: LogLevel): boolean {
        return this.levelPriority[level] <= this.levelPriority[this.minLevel];
    }

    private sanitizeContext(context: LogContext): LogContext {
        const sanitized: LogContext = {};

        for (const [key, value] of Object.entries(context)) {
            const lowerKey = key.toLowerCase();
            const isSensitive = [...this.sensitiveKeys].some(sk => lowerKey.includes(sk));

            if (isSensitive && value !== undefined && value !== null) {
                sanitized[key] = '[REDACTED]';
            } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
                sanitized[key] = this.sanitizeContext({ ...value });
            } else {
                sanitized[key] = value;
            }
        }

        return sanitized;
    }

    private formatEntry(entry: LogEntry): string {
        const parts: string[] = [
            `[${entry.timestamp}]`,
            `[${entry.level.toUpperCase()}]`,
            `[${entry.module}]`
        ];

        if (entry.code) {
            parts.push(`[${entry.code}]`);
        }

        parts.push(entry.message);

        if (entry.context) {
            // module and code are already in the line prefix
            const { module, code, ...rest } = entry.context;
            void module; void code;
            if (Object.keys(rest).length > 0) {
                parts.push(JSON.stringify(this.sanitizeContext(rest)));
            }
        }

        return parts.join(' ');
    }

    private async sendToMcp(entry: LogEntry): Promise<void> {
        if (!this.mcpServer) {
            return;
        }

        const data: Record<string, unknown> = {
            message: entry.message,
            module: entry.module
        };
        if (entry.code) data['code'] = entry.code;
        if (entry.context) {
            Object.assign(data, this.sanitizeContext(entry.context));
        }

        try {
            await this.mcpServer.sendLoggingMessage({
                level: entry.level,
                logger: this.loggerName,
                data
            });
        } catch (error) {
            // Not re-logged through this logger: that would recurse
            console.error(`[${new Date().toISOString()}] [WARNING] [SERVER] Failed to forward log record: ${
                error instanceof Error ? error.message : String(error)
            }`);
        }
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            level,
            module: context?.module ?? 'SERVER',
            code: context?.code,
            message,
            timestamp: new Date().toISOString(),
            context
        };

        console.error(this.formatEntry(entry));

        void this.sendToMcp(entry);
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    notice(message: string, context?: LogContext): void {
        this.log('notice', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warning', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    critical(message: string, context?: LogContext): void {
        this.log('critical', message, context);
    }

    /**
     * Create a child logger scoped to a specific module
     */
    forModule(module: LogModule): ModuleLogger {
        return new ModuleLogger(this, module);
    }
}

/**
 * Module-scoped logger
 */
export class ModuleLogger {
    constructor(
        private readonly parent: Logger,
        private readonly module: LogModule
    ) { }

    private withModule(context?: LogContext): LogContext {
        return { ...context, module: this.module };
    }

    debug(message: string, context?: LogContext): void {
        this.parent.debug(message, this.withModule(context));
    }

    info(message: string, context?: LogContext): void {
        this.parent.info(message, this.withModule(context));
    }

    warn(message: string, context?: LogContext): void {
        this.parent.warn(message, this.withModule(context));
    }

    error(message: string, context?: LogContext): void {
        this.parent.error(message, this.withModule(context));
    }
}

export const logger = new Logger();
