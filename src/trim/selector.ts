/**
 * Budgeted selection over a (system-free) conversation.
 *
 * Two strategies, chosen by `minTurns`:
 * - message-preserving (`minTurns === 0`): newest-first scan over single
 *   messages, budget-strict except for forced content
 * - turn-preserving (`minTurns > 0`): newest-first scan over whole turns,
 *   keeping at least `minTurns` turns even past budget
 *
 * Forced content (the latest turn and priority-role messages) is kept and
 * costed but never stops the scan. An oversized optional item is skipped and
 * older items are still considered.
 *
 * Both return ascending positional indices into `conversation`.
 */

import type { ChatMessage, Turn } from '../lib/types';

export interface SelectionInput<M extends ChatMessage = ChatMessage> {
    conversation: readonly M[];
    /** `groupTurns(conversation)` */
    turns: readonly Turn<M>[];
    /** Token cost per conversation index */
    costs: readonly number[];
    remainingBudget: number;
    priorityRoles: ReadonlySet<string>;
}

export type SelectionStrategy = 'message' | 'turn';

export function strategyFor(minTurns: number): SelectionStrategy {
    return minTurns > 0 ? 'turn' : 'message';
}

/**
 * Message-preserving strategy.
 */
export function selectMessages<M extends ChatMessage>(input: SelectionInput<M>): number[] {
    const { conversation, turns, costs, remainingBudget, priorityRoles } = input;

    const forced = new Set<number>(turns.length > 0 ? turns[turns.length - 1].indices : []);
    conversation.forEach((message, index) => {
        if (priorityRoles.has(message.role)) {
            forced.add(index);
        }
    });

    const kept: number[] = [];
    let keptTotal = 0;

    for (let index = conversation.length - 1; index >= 0; index--) {
        const cost = costs[index];
        if (!forced.has(index) && keptTotal + cost > remainingBudget) {
            continue;
        }
        kept.push(index);
        keptTotal += cost;
    }

    return kept.reverse();
}

/**
 * Turn-preserving strategy. The latest turn counts toward `minTurns`.
 */
export function selectTurns<M extends ChatMessage>(input: SelectionInput<M>, minTurns: number): number[] {
    const { turns, costs, remainingBudget, priorityRoles } = input;
    if (turns.length === 0) {
        return [];
    }

    const turnCost = (turn: Turn<M>) => turn.indices.reduce((sum, index) => sum + costs[index], 0);

    const latest = turns[turns.length - 1];
    const keptTurns: Turn<M>[] = [latest];
    let keptTotal = turnCost(latest);
    let turnsKept = 1;

    for (let position = turns.length - 2; position >= 0; position--) {
        const turn = turns[position];
        const cost = turnCost(turn);
        const hasPriority = turn.messages.some((message) => priorityRoles.has(message.role));

        if (keptTotal + cost <= remainingBudget || turnsKept < minTurns || hasPriority) {
            keptTurns.push(turn);
            keptTotal += cost;
            turnsKept++;
        }
    }

    return keptTurns.reverse().flatMap((turn) => turn.indices);
}

/**
 * Run the strategy selected by `minTurns`.
 */
export function selectConversation<M extends ChatMessage>(input: SelectionInput<M>, minTurns: number): number[] {
    return strategyFor(minTurns) === 'turn'
        ? selectTurns(input, minTurns)
        : selectMessages(input);
}
