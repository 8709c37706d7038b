/**
 * Context trimming coordinator.
 *
 * Pipeline: counter → system/conversation split → budget → turns →
 * strategy → assembly → metrics. Each call builds its own state and returns
 * fresh arrays; the input list and its messages are never mutated.
 *
 * @example
 * ```typescript
 * const { messages, metrics } = trim(history, {
 *     targetTokens: 4096,
 *     model: 'gpt-4o',
 *     priorityRoles: ['developer'],
 * });
 * ```
 */

import type { ChatMessage, TrimResult } from '../lib/types';
import { SYSTEM_ROLE } from '../lib/types';
import type { EncodingRegistry } from '../lib/encoding-registry';
import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import { TokenCounter } from '../lib/token-counter';
import { allocateBudget, clampTargetTokens } from './budget';
import { groupTurns } from './turns';
import { selectConversation, strategyFor } from './selector';
import { computeTrimMetrics } from './metrics';

export interface TrimOptions {
    /** Requested token budget; clamped up to the budget floor */
    targetTokens: number;
    /** Model name used to pick the tokenizer */
    model: string;
    /** Minimum turns to keep; 0 selects the message-preserving strategy (default: 0) */
    minTurns?: number;
    /** Roles whose messages are never dropped. A bare string is one role. */
    priorityRoles?: Iterable<string>;
    /** Tokenizer registry (default: shared tiktoken registry) */
    registry?: EncodingRegistry;
    logger?: Logger;
}

/** Options after clamping */
export interface NormalizedTrimOptions {
    targetTokens: number;
    model: string;
    minTurns: number;
    priorityRoles: ReadonlySet<string>;
}

export function clampMinTurns(minTurns: number | undefined): number {
    if (minTurns === undefined || !Number.isFinite(minTurns)) {
        return 0;
    }
    return Math.max(0, Math.floor(minTurns));
}

export function normalizePriorityRoles(roles: Iterable<string> | undefined): ReadonlySet<string> {
    if (roles === undefined) {
        return new Set();
    }
    if (typeof roles === 'string') {
        return new Set([roles]);
    }
    return new Set(roles);
}

export function normalizeTrimOptions(options: TrimOptions): NormalizedTrimOptions {
    return {
        targetTokens: clampTargetTokens(options.targetTokens),
        model: String(options.model ?? ''),
        minTurns: clampMinTurns(options.minTurns),
        priorityRoles: normalizePriorityRoles(options.priorityRoles),
    };
}

/**
 * Select the messages that fit the budget.
 *
 * Guarantees: output is an order-preserving subsequence of `messages`; the
 * latest turn and every priority-role message are present; the first system
 * message is present. Never throws for well-formed input.
 */
export function trim<M extends ChatMessage>(messages: readonly M[], options: TrimOptions): TrimResult<M> {
    const logger = options.logger ?? noopLogger;
    const { targetTokens, model, minTurns, priorityRoles } = normalizeTrimOptions(options);
    const counter = new TokenCounter(model, { registry: options.registry, logger });

    const systemPositions: number[] = [];
    const conversationPositions: number[] = [];
    messages.forEach((message, index) => {
        (message.role === SYSTEM_ROLE ? systemPositions : conversationPositions).push(index);
    });
    const systemMessages = systemPositions.map((index) => messages[index]);
    const conversation = conversationPositions.map((index) => messages[index]);

    const allocation = allocateBudget(targetTokens, systemMessages, priorityRoles, counter);
    const turns = groupTurns(conversation);
    const selected = selectConversation(
        {
            conversation,
            turns,
            costs: conversation.map((message) => counter.countMessage(message)),
            remainingBudget: allocation.remainingBudget,
            priorityRoles,
        },
        minTurns,
    );

    const keptPositions = [
        ...allocation.keptIndices.map((index) => systemPositions[index]),
        ...selected.map((index) => conversationPositions[index]),
    ].sort((a, b) => a - b);
    const output = keptPositions.map((index) => messages[index]);

    const metrics = computeTrimMetrics({
        inputMessages: messages,
        outputMessages: output,
        counter,
    });

    logger.debug('Context trimmed', {
        model,
        strategy: strategyFor(minTurns),
        targetTokens,
        remainingBudget: allocation.remainingBudget,
        turns: turns.length,
        keptMessages: output.length,
        droppedMessages: messages.length - output.length,
        compressRatio: metrics.compress_ratio,
    });

    return { messages: output, metrics };
}

export interface TrimMessagesOptions {
    minTurns?: number;
    priorityRoles?: Iterable<string>;
    registry?: EncodingRegistry;
    logger?: Logger;
}

/**
 * Positional form of `trim`.
 */
export function trimMessages<M extends ChatMessage>(
    messages: readonly M[],
    targetTokens: number,
    model: string,
    options: TrimMessagesOptions = {},
): TrimResult<M> {
    return trim(messages, { ...options, targetTokens, model });
}
