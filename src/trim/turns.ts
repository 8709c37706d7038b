import type { ChatMessage, Turn } from '../lib/types';
import { USER_ROLE } from '../lib/types';

/**
 * Partition a conversation into turns.
 *
 * A user message opens a new turn; every other message joins the open turn,
 * opening one first when the conversation starts with non-user messages.
 * Concatenating the returned turns reproduces the input exactly.
 */
export function groupTurns<M extends ChatMessage>(conversation: readonly M[]): Turn<M>[] {
    const turns: Turn<M>[] = [];
    let current: Turn<M> | undefined;

    for (let index = 0; index < conversation.length; index++) {
        const message = conversation[index];
        if (message.role === USER_ROLE || !current) {
            current = { indices: [], messages: [] };
            turns.push(current);
        }
        current.indices.push(index);
        current.messages.push(message);
    }

    return turns;
}
