import * as pulumi from "@pulumi/pulumi";

/**
 * Log levels for structured logging
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Parse a level name (case-insensitive). Unknown names yield undefined.
 */
export function parseLogLevel(level: string | undefined): LogLevel | undefined {
    switch (level?.toUpperCase()) {
        case 'DEBUG': return LogLevel.DEBUG;
        case 'INFO': return LogLevel.INFO;
        case 'WARN': return LogLevel.WARN;
        case 'ERROR': return LogLevel.ERROR;
        case 'SILENT': return LogLevel.SILENT;
        default: return undefined;
    }
}

/**
 * Minimum log level from PULUMI_LOG_LEVEL, INFO when unset
 */
export function getMinLogLevel(): LogLevel {
    return parseLogLevel(process.env.PULUMI_LOG_LEVEL) ?? LogLevel.INFO;
}

/**
 * Log context interface for structured logging
 */
export interface LogContext {
    componentType?: string;
    componentName?: string;
    resourceType?: string;
    resourceName?: string;
    operation?: string;
    region?: string;
    stackName?: string;
    [key: string]: unknown;
}

export interface ComponentLoggerOptions {
    /** Overrides PULUMI_LOG_LEVEL for this logger */
    minLevel?: LogLevel;
}

/**
 * Structured logger for components
 */
export class ComponentLogger {
    private readonly componentType: string;
    private readonly componentName: string;
    private readonly baseContext: LogContext;
    private readonly minLevel?: LogLevel;

    constructor(
        componentType: string,
        componentName: string,
        additionalContext?: LogContext,
        options?: ComponentLoggerOptions
    ) {
        this.componentType = componentType;
        this.componentName = componentName;
        this.baseContext = {
            componentType,
            componentName,
            ...additionalContext
        };
        this.minLevel = options?.minLevel;
    }

    public debug(message: string, context?: LogContext): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    public info(message: string, context?: LogContext): void {
        this.log(LogLevel.INFO, message, context);
    }

    public warn(message: string, context?: LogContext): void {
        this.log(LogLevel.WARN, message, context);
    }

    /**
     * Log error message, with the error's name, message and stack in the context
     */
    public error(message: string, error?: Error, context?: LogContext): void {
        const errorContext = error ? {
            error: {
                name: error.name,
                message: error.message,
                stack: error.stack
            }
        } : {};

        this.log(LogLevel.ERROR, message, { ...errorContext, ...context });
    }

    /**
     * Log a resource declaration. Nothing is created until the engine applies the plan.
     */
    public resourceDeclared(resourceType: string, resourceName: string, context?: LogContext): void {
        this.debug(`Declared ${resourceType}: ${resourceName}`, {
            resourceType,
            resourceName,
            operation: 'declare',
            ...context
        });
    }

    public validationFailure(operation: string, error: Error, context?: LogContext): void {
        this.warn(`Validation failed: ${operation}`, {
            operation: `validation_${operation}_failure`,
            error: {
                name: error.name,
                message: error.message
            },
            ...context
        });
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        const minLevel = this.minLevel ?? getMinLogLevel();
        if (level < minLevel) {
            return;
        }

        const logMessage = `[${this.componentType}:${this.componentName}] ${message}`;

        // Context is noisy; only DEBUG runs and errors carry it
        const includeContext = minLevel === LogLevel.DEBUG || level === LogLevel.ERROR;
        const contextString = includeContext && context
            ? ` | Context: ${JSON.stringify({ ...this.baseContext, ...context })}`
            : '';

        switch (level) {
            case LogLevel.DEBUG:
                // Pulumi doesn't surface debug by default, use info with a prefix
                pulumi.log.info(`DEBUG: ${logMessage}${contextString}`);
                break;
            case LogLevel.INFO:
                pulumi.log.info(`${logMessage}${contextString}`);
                break;
            case LogLevel.WARN:
                pulumi.log.warn(`${logMessage}${contextString}`);
                break;
            case LogLevel.ERROR:
                pulumi.log.error(`${logMessage}${contextString}`);
                break;
        }
    }
}
