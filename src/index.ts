// Trimming
export * from './trim';

// Shared types
export type {
    ChatMessage,
    Turn,
    TokenCounterMode,
    TokenCounterInfo,
    TrimMetrics,
    TrimResult,
} from './lib/types';
export { SYSTEM_ROLE, USER_ROLE } from './lib/types';

// Token counting
export {
    TokenCounter,
    getTokenCounter,
    heuristicTokenCount,
    resolveEncodingName,
    MODEL_PREFIX_ENCODINGS,
    HEURISTIC_CHARS_PER_TOKEN,
} from './lib/token-counter';
export type { TokenCounterOptions } from './lib/token-counter';
export {
    TiktokenRegistry,
    defaultEncodingRegistry,
    createByteLevelEncoding,
    isBundledEncoding,
    BUNDLED_ENCODINGS,
    END_OF_TEXT,
} from './lib/encoding-registry';
export type { Encoder, EncodingRegistry, TiktokenRegistryOptions } from './lib/encoding-registry';
export { contentToText } from './lib/content';

// Logging
export { consoleLogger, noopLogger, createFilteredLogger, LOG_LEVELS } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';

// Error types
export { ContextBudgetError, ConfigError } from './lib/errors';
export type { ValidationErrorItem } from './lib/errors';

// Configuration
export {
    DEFAULT_TRIM_CONFIG,
    trimConfigSchema,
    parseTrimConfig,
    loadTrimConfigFromEnv,
    toTrimOptions,
} from './config';
export type { TrimConfig, TrimOptionsOverrides } from './config';

// Observability
export { TrimMetricsRegistry } from './observability/prometheus';
export type { TrimMetricsRegistryOptions } from './observability/prometheus';
export { buildTrimLogRecord, logTrimRecord, timedTrim } from './observability/request-log';
export type { TrimLogRecord, TrimLogInput, TimedTrim } from './observability/request-log';

// Semantic retention
export {
    createSemanticRetentionScorer,
    withSemanticRetention,
    cosineSimilarity,
    aggregateContent,
} from './retention/semantic-retention';
export type {
    Embedder,
    SemanticRetentionScorer,
    SemanticRetentionOptions,
} from './retention/semantic-retention';
