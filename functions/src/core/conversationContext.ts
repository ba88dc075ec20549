import * as logger from "firebase-functions/logger";
import { InvalidRequestError } from '../lib/errors';
import { KeyedSerializer } from '../lib/keyedSerializer';
import { ConversationRepository } from '../stores/conversationStore';
import { ContextSummary, ConversationContext, Message, MessageRole } from '../types';

export function createMessage(role: MessageRole, text: string, at: Date = new Date()): Message {
  return Object.freeze({ role, text, timestamp: at.toISOString() });
}

export function emptyContext(userId: string, at: Date = new Date()): ConversationContext {
  return Object.freeze({ userId, messages: Object.freeze([]), createdAt: at.toISOString() });
}

/**
 * Owns the chat history of a session. Contexts are frozen values: `append`
 * hands back a new context and leaves the one it was given untouched.
 */
export class ConversationContextManager {
  constructor(
    private readonly repository: ConversationRepository,
    readonly defaultWindow = 10,
    private readonly writes = new KeyedSerializer(),
    private readonly now: () => Date = () => new Date()
  ) {}

  append(context: ConversationContext, message: Message): ConversationContext {
    return Object.freeze({
      ...context,
      messages: Object.freeze([...context.messages, message]),
    });
  }

  window(context: ConversationContext, maxMessages = this.defaultWindow): Message[] {
    if (maxMessages <= 0) return [];
    return context.messages.slice(-maxMessages);
  }

  async load(userId: string): Promise<ConversationContext> {
    const stored = await this.repository.load(userId);
    if (!stored) {
      return emptyContext(userId, this.now());
    }
    return Object.freeze({
      userId,
      createdAt: stored.createdAt,
      messages: Object.freeze([...stored.messages]),
    });
  }

  /**
   * Writes the messages `updated` added on top of `base`. They land after any
   * history stored since `base` was loaded; the returned context is what the
   * store now holds.
   */
  async persist(updated: ConversationContext, base: ConversationContext): Promise<ConversationContext> {
    if (updated.userId !== base.userId || updated.messages.length < base.messages.length) {
      throw new InvalidRequestError(`Context for ${updated.userId} does not extend the one it was built on`);
    }
    const added = updated.messages.slice(base.messages.length);
    const stored = await this.writes.run(updated.userId, () =>
      this.repository.append(updated.userId, updated.createdAt, added)
    );
    logger.debug('Persisted conversation', { userId: stored.userId, added: added.length, messages: stored.messages.length });
    return Object.freeze({ ...stored, messages: Object.freeze([...stored.messages]) });
  }

  summarize(context: ConversationContext): ContextSummary {
    const last = context.messages[context.messages.length - 1];
    return {
      userId: context.userId,
      messageCount: context.messages.length,
      turnCount: context.messages.filter(m => m.role === 'user').length,
      lastMessageAt: last ? last.timestamp : null,
    };
  }
}
