import {
    TrimMetricsRegistry,
    buildTrimLogRecord,
    consoleLogger,
    loadTrimConfigFromEnv,
    logTrimRecord,
    timedTrim,
    toTrimOptions,
} from '../src';
import type { ChatMessage } from '../src';

// Usage Example
// Run with: CONTEXT_TRIM_TARGET_TOKENS=300 CONTEXT_TRIM_LOG_LEVEL=debug npx tsx examples/usage.ts

const history: ChatMessage[] = [
    { role: 'system', content: 'You are a concise travel assistant.' },
    { role: 'user', content: 'I am planning a week in Lisbon. ' + 'Tell me about the neighbourhoods. '.repeat(40) },
    { role: 'assistant', content: 'Alfama, Baixa and Belém are good starting points. '.repeat(30) },
    { role: 'developer', content: 'Always quote prices in euros.' },
    { role: 'user', content: 'What does a tram day pass cost?' },
];

async function main() {
    const config = loadTrimConfigFromEnv();
    const options = toTrimOptions(config);
    const gauges = new TrimMetricsRegistry({ defaultLabels: { service: 'example' } });

    console.log('--- Trim ---');
    const { result, latencyMs } = timedTrim(history, { ...options, priorityRoles: ['developer'] });
    for (const message of result.messages) {
        console.log(`${message.role}: ${message.content.slice(0, 60)}`);
    }

    console.log('\n--- Request Log ---');
    logTrimRecord(consoleLogger, buildTrimLogRecord({
        model: config.model,
        inputCount: history.length,
        result,
        latencyMs,
    }));

    console.log('\n--- Prometheus ---');
    gauges.observe(result.metrics);
    console.log(await gauges.render());
}

main().catch((error) => {
    console.error('Example failed:', error);
    process.exitCode = 1;
});
