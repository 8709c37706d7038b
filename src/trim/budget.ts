import type { ChatMessage } from '../lib/types';
import type { TokenCounter } from '../lib/token-counter';

/** Minimum usable budget, whatever the caller asks for */
export const BUDGET_FLOOR = 256;

/**
 * Clamp a requested target to a whole number no lower than `BUDGET_FLOOR`.
 * Non-finite targets fall back to the floor.
 */
export function clampTargetTokens(targetTokens: number): number {
    if (!Number.isFinite(targetTokens)) {
        return BUDGET_FLOOR;
    }
    return Math.max(BUDGET_FLOOR, Math.floor(targetTokens));
}

export interface BudgetAllocation<M extends ChatMessage = ChatMessage> {
    /** System messages that survive trimming, in input order */
    keptSystemMessages: M[];
    /** Positions of `keptSystemMessages` within the system messages passed in */
    keptIndices: number[];
    /** Cost of `keptSystemMessages` */
    systemTokens: number;
    /** Budget left for the conversation */
    remainingBudget: number;
}

/**
 * Reserve budget for retained system messages.
 *
 * The first system message is always kept. Later ones are kept only when
 * their role is itself a priority role, which in practice means the caller
 * pinned `'system'`.
 */
export function allocateBudget<M extends ChatMessage>(
    targetTokens: number,
    systemMessages: readonly M[],
    priorityRoles: ReadonlySet<string>,
    counter: TokenCounter,
): BudgetAllocation<M> {
    const baseBudget = clampTargetTokens(targetTokens);

    const keptIndices: number[] = [];
    systemMessages.forEach((message, index) => {
        if (index === 0 || priorityRoles.has(message.role)) {
            keptIndices.push(index);
        }
    });
    const keptSystemMessages = keptIndices.map((index) => systemMessages[index]);
    const systemTokens = counter.countMessages(keptSystemMessages);

    return {
        keptSystemMessages,
        keptIndices,
        systemTokens,
        remainingBudget: Math.max(0, baseBudget - systemTokens),
    };
}
