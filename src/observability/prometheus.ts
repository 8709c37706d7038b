/**
 * Prometheus gauges for trim metrics.
 *
 * Each instance owns its own prom-client `Registry`, so several services (or
 * tests) in one process do not collide on metric names.
 *
 * @example
 * ```typescript
 * const gauges = new TrimMetricsRegistry();
 * gauges.observe(result.metrics);
 * response.setHeader('Content-Type', gauges.contentType);
 * response.end(await gauges.render());
 * ```
 */

import { Counter, Gauge, Registry } from 'prom-client';
import type { TrimMetrics } from '../lib/types';

export interface TrimMetricsRegistryOptions {
    /** Registry to register into (default: a fresh one) */
    registry?: Registry;
    /** Labels added to every sample */
    defaultLabels?: Record<string, string>;
}

export class TrimMetricsRegistry {
    readonly registry: Registry;
    readonly compressRatio: Gauge;
    readonly semanticRetention: Gauge;
    readonly inputTokens: Gauge;
    readonly outputTokens: Gauge;
    readonly trimsTotal: Counter<'mode'>;

    constructor(options: TrimMetricsRegistryOptions = {}) {
        this.registry = options.registry ?? new Registry();
        if (options.defaultLabels) {
            this.registry.setDefaultLabels(options.defaultLabels);
        }

        this.compressRatio = new Gauge({
            name: 'compress_ratio',
            help: 'Ratio of tokens kept after trimming.',
            registers: [this.registry],
        });
        this.semanticRetention = new Gauge({
            name: 'semantic_retention',
            help: 'Semantic retention score for trimmed context.',
            registers: [this.registry],
        });
        this.inputTokens = new Gauge({
            name: 'context_trim_input_tokens',
            help: 'Tokens in the conversation before the latest trim.',
            registers: [this.registry],
        });
        this.outputTokens = new Gauge({
            name: 'context_trim_output_tokens',
            help: 'Tokens kept by the latest trim.',
            registers: [this.registry],
        });
        this.trimsTotal = new Counter({
            name: 'context_trim_total',
            help: 'Trims observed, by token counting mode.',
            labelNames: ['mode'],
            registers: [this.registry],
        });
    }

    /**
     * Record the latest trim. An unset retention score is exported as NaN.
     */
    observe(metrics: TrimMetrics): void {
        this.compressRatio.set(metrics.compress_ratio);
        this.semanticRetention.set(metrics.semantic_retention ?? Number.NaN);
        this.inputTokens.set(metrics.input_tokens);
        this.outputTokens.set(metrics.output_tokens);
        this.trimsTotal.inc({ mode: metrics.token_counter.mode });
    }

    get contentType(): string {
        return this.registry.contentType;
    }

    /** Prometheus exposition text */
    render(): Promise<string> {
        return this.registry.metrics();
    }
}
