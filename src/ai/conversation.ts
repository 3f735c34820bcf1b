import { ConversationOrderError } from '../core/errors';
import { ChatMessage, ToolCall } from './openaiClient';

export const COMPRESSED_SUMMARY_HEADER = '[COMPRESSED RESEARCH SUMMARY]';

/**
 * Append-only message list. A tool result can only follow the assistant turn
 * that requested it (or sibling results of that same turn), so the list sent
 * to the provider never holds an orphaned tool message.
 */
export class ConversationHistory {
    private readonly items: ChatMessage[] = [];

    constructor(initial: ChatMessage[] = []) {
        for (const message of initial) {
            this.append(message);
        }
    }

    get length(): number {
        return this.items.length;
    }

    messages(): ChatMessage[] {
        return [...this.items];
    }

    append(message: ChatMessage): this {
        if (message.role === 'tool') {
            this.assertToolResultAllowed(message.toolCallId);
        }
        this.items.push(message);
        return this;
    }

    appendAssistant(content: string, toolCalls: ToolCall[] = []): this {
        return this.append({ role: 'assistant', content, toolCalls });
    }

    appendToolResult(toolCallId: string, content: string): this {
        return this.append({ role: 'tool', toolCallId, content });
    }

    /** Ids requested by the last assistant turn that have no result yet. */
    pendingToolCallIds(): string[] {
        const { requested, answered } = this.openToolTurn();
        return requested.filter((id) => !answered.has(id));
    }

    /**
     * Index where the preserved tail starts, or null when there is nothing in
     * the middle to compress. The split moves backward so the tail never opens
     * with a tool result.
     */
    compactionSplit(preserveLast: number): number | null {
        const keep = Math.max(1, preserveLast);
        if (this.items.length <= 1 + keep) {
            return null;
        }
        let split = this.items.length - keep;
        while (split > 1 && this.items[split].role === 'tool') {
            split -= 1;
        }
        return split > 1 ? split : null;
    }

    middle(preserveLast: number): ChatMessage[] {
        const split = this.compactionSplit(preserveLast);
        return split === null ? [] : this.items.slice(1, split);
    }

    /**
     * New history made of the first message, a summary system message and the tail.
     */
    compact(summary: string, preserveLast: number): ConversationHistory {
        const split = this.compactionSplit(preserveLast);
        if (split === null) {
            return new ConversationHistory(this.items);
        }
        return new ConversationHistory([
            this.items[0],
            { role: 'system', content: `${COMPRESSED_SUMMARY_HEADER}\n\n${summary}` },
            ...this.items.slice(split),
        ]);
    }

    private openToolTurn(): { requested: string[]; answered: Set<string> } {
        const answered = new Set<string>();
        for (let i = this.items.length - 1; i >= 0; i--) {
            const item = this.items[i];
            if (item.role === 'tool') {
                answered.add(item.toolCallId);
                continue;
            }
            if (item.role === 'assistant') {
                return { requested: item.toolCalls.map((call) => call.id), answered };
            }
            break;
        }
        return { requested: [], answered };
    }

    private assertToolResultAllowed(toolCallId: string): void {
        const { requested, answered } = this.openToolTurn();
        if (!requested.includes(toolCallId)) {
            throw new ConversationOrderError(
                `Tool result "${toolCallId}" does not answer the preceding assistant turn`
            );
        }
        if (answered.has(toolCallId)) {
            throw new ConversationOrderError(`Tool result "${toolCallId}" was already appended`);
        }
    }
}
