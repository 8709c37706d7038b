export class ContextBudgetError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContextBudgetError';
    }
}

/** Validation error details */
export interface ValidationErrorItem {
    path: (string | number)[];
    message: string;
}

/**
 * Error thrown when trim configuration cannot be parsed.
 * `trim` itself never throws this; only the strict config loaders do.
 *
 * @example
 * ```typescript
 * try {
 *     loadTrimConfigFromEnv({ CONTEXT_TRIM_MIN_TURNS: 'many' });
 * } catch (error) {
 *     if (error instanceof ConfigError) {
 *         console.error(error.issues);
 *     }
 * }
 * ```
 */
export class ConfigError extends ContextBudgetError {
    /** Validation errors */
    issues: ValidationErrorItem[];

    constructor(message: string, issues: ValidationErrorItem[]) {
        super(message);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
