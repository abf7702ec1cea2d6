/**
 * Error types raised while declaring network components.
 * Every error carries the component it came from so the engine's
 * diagnostics point at the right resource.
 */
export class ComponentError extends Error {
    public readonly componentType: string;
    public readonly componentName: string;
    public readonly errorCode: string;
    public readonly timestamp: Date;
    public readonly context?: Record<string, unknown>;

    constructor(
        componentType: string,
        componentName: string,
        message: string,
        errorCode: string = 'COMPONENT_ERROR',
        context?: Record<string, unknown>
    ) {
        super(`[${componentType}:${componentName}] ${message}`);
        this.name = 'ComponentError';
        this.componentType = componentType;
        this.componentName = componentName;
        this.errorCode = errorCode;
        this.timestamp = new Date();
        this.context = context;
    }
}

export class ValidationError extends ComponentError {
    constructor(
        componentType: string,
        componentName: string,
        fieldName: string,
        value: unknown,
        expectedType?: string,
        context?: Record<string, unknown>
    ) {
        const message = expectedType
            ? `Invalid ${fieldName}: expected ${expectedType}, got ${typeof value} (${String(value)})`
            : `Invalid ${fieldName}: ${String(value)}`;

        super(componentType, componentName, message, 'VALIDATION_ERROR', {
            fieldName,
            value,
            expectedType,
            ...context
        });
        this.name = 'ValidationError';
    }
}

export class DependencyError extends ComponentError {
    public readonly dependencyType: string;
    public readonly dependencyName: string;

    constructor(
        componentType: string,
        componentName: string,
        dependencyType: string,
        dependencyName: string,
        message: string,
        context?: Record<string, unknown>
    ) {
        super(componentType, componentName, `Dependency error with ${dependencyType} '${dependencyName}': ${message}`, 'DEPENDENCY_ERROR', {
            dependencyType,
            dependencyName,
            ...context
        });
        this.name = 'DependencyError';
        this.dependencyType = dependencyType;
        this.dependencyName = dependencyName;
    }
}

export class ConfigurationError extends ComponentError {
    public readonly configPath: string;

    constructor(
        componentType: string,
        componentName: string,
        configPath: string,
        message: string,
        context?: Record<string, unknown>
    ) {
        super(componentType, componentName, `Configuration error at '${configPath}': ${message}`, 'CONFIGURATION_ERROR', {
            configPath,
            ...context
        });
        this.name = 'ConfigurationError';
        this.configPath = configPath;
    }
}

/**
 * Raised by CIDR arithmetic. Component type and name are filled in by
 * callers that know them; standalone use reports "cidr".
 */
export class CidrError extends ComponentError {
    public readonly cidr: string;
    public readonly detail: string;

    constructor(cidr: string, detail: string, context?: Record<string, unknown>, componentType = 'cidr', componentName = 'cidr') {
        super(componentType, componentName, `${detail} (${cidr})`, 'CIDR_ERROR', { cidr, ...context });
        this.name = 'CidrError';
        this.cidr = cidr;
        this.detail = detail;
    }

    /**
     * Same error, attributed to a component
     */
    public withComponent(componentType: string, componentName: string): CidrError {
        return new CidrError(this.cidr, this.detail, this.context, componentType, componentName);
    }
}

/**
 * Validation utilities with enhanced error reporting
 */
export class ValidationUtils {
    public static validateRequired<T>(
        value: T | undefined | null,
        fieldName: string,
        componentType: string,
        componentName: string,
        expectedType?: string
    ): T {
        if (value === undefined || value === null) {
            throw new ValidationError(componentType, componentName, fieldName, value, expectedType || 'non-null value');
        }
        return value;
    }

    public static validateFormat(
        value: string,
        fieldName: string,
        pattern: RegExp,
        componentType: string,
        componentName: string,
        formatDescription?: string
    ): void {
        if (!pattern.test(value)) {
            throw new ValidationError(
                componentType,
                componentName,
                fieldName,
                value,
                formatDescription || `string matching ${pattern}`,
                { pattern: pattern.source }
            );
        }
    }

    public static validateRange(
        value: number,
        fieldName: string,
        min: number,
        max: number,
        componentType: string,
        componentName: string
    ): void {
        if (!Number.isInteger(value) || value < min || value > max) {
            throw new ValidationError(
                componentType,
                componentName,
                fieldName,
                value,
                `integer between ${min} and ${max}`,
                { min, max }
            );
        }
    }

    public static validateEnum<T>(
        value: T,
        fieldName: string,
        validValues: readonly T[],
        componentType: string,
        componentName: string
    ): void {
        if (!validValues.includes(value)) {
            throw new ValidationError(
                componentType,
                componentName,
                fieldName,
                value,
                `one of: ${validValues.join(', ')}`,
                { validValues }
            );
        }
    }

    /**
     * Reject repeated entries, reporting the first duplicate
     */
    public static validateUnique(
        values: readonly string[],
        fieldName: string,
        componentType: string,
        componentName: string
    ): void {
        const seen = new Set<string>();
        for (const value of values) {
            if (seen.has(value)) {
                throw new ValidationError(componentType, componentName, fieldName, value, 'unique values', { duplicate: value });
            }
            seen.add(value);
        }
    }

    /**
     * Validate AWS region format, GovCloud included (e.g. us-gov-west-1)
     */
    public static validateRegion(
        region: string,
        componentType: string,
        componentName: string
    ): void {
        this.validateFormat(
            region,
            'region',
            /^[a-z]{2}(-gov)?-[a-z]+-\d+$/,
            componentType,
            componentName,
            'AWS region format (e.g., us-east-1)'
        );
    }

    /**
     * Validate tags against the EC2 tagging limits
     */
    public static validateTags(
        tags: Record<string, string>,
        componentType: string,
        componentName: string
    ): void {
        const entries = Object.entries(tags);
        if (entries.length > 50) {
            throw new ValidationError(componentType, componentName, 'tags', entries.length, 'at most 50 tags');
        }

        for (const [key, value] of entries) {
            if (key.length === 0 || key.length > 128) {
                throw new ValidationError(componentType, componentName, 'tag key', key, 'string of 1 to 128 characters');
            }
            if (key.toLowerCase().startsWith('aws:')) {
                throw new ValidationError(componentType, componentName, 'tag key', key, "key without the reserved 'aws:' prefix");
            }
            if (typeof value !== 'string' || value.length > 256) {
                throw new ValidationError(componentType, componentName, `tag.${key}`, value, 'string of at most 256 characters');
            }
        }
    }
}
