import { DocumentData, Firestore } from "firebase-admin/firestore";
import { errorMessage, PersistenceError } from '../lib/errors';
import { ConversationContext, Message } from '../types';

export interface ConversationRepository {
  load(userId: string): Promise<ConversationContext | null>;
  /**
   * Adds messages after whatever history is stored at write time and returns
   * the stored result. Another instance may have written since the caller
   * loaded, so the stored list is never replaced wholesale.
   */
  append(userId: string, createdAt: string, messages: readonly Message[]): Promise<ConversationContext>;
}

const CONVERSATIONS = 'conversations';

function toMessage(d: DocumentData): Message {
  return {
    role: d.role === 'assistant' ? 'assistant' : 'user',
    text: String(d.text ?? ''),
    timestamp: String(d.timestamp ?? ''),
  };
}

function storedMessages(d: DocumentData): Message[] {
  const messages: DocumentData[] = Array.isArray(d.messages) ? d.messages : [];
  return messages.map(toMessage);
}

/** One document per user: `conversations/{userId}` with the full message list. */
export class FirestoreConversationRepository implements ConversationRepository {
  constructor(private readonly db: Firestore) {}

  async load(userId: string): Promise<ConversationContext | null> {
    try {
      const snapshot = await this.db.collection(CONVERSATIONS).doc(userId).get();
      const d = snapshot.data();
      if (!d) return null;
      return {
        userId,
        createdAt: String(d.createdAt ?? ''),
        messages: storedMessages(d),
      };
    } catch (error) {
      throw new PersistenceError(`Conversation read failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async append(userId: string, createdAt: string, messages: readonly Message[]): Promise<ConversationContext> {
    const ref = this.db.collection(CONVERSATIONS).doc(userId);
    try {
      return await this.db.runTransaction(async tx => {
        const snapshot = await tx.get(ref);
        const existing = snapshot.data();
        const stored: ConversationContext = {
          userId,
          createdAt: existing ? String(existing.createdAt ?? createdAt) : createdAt,
          messages: [...(existing ? storedMessages(existing) : []), ...messages],
        };
        tx.set(ref, {
          createdAt: stored.createdAt,
          updatedAt: new Date().toISOString(),
          messageCount: stored.messages.length,
          messages: stored.messages.map(m => ({ role: m.role, text: m.text, timestamp: m.timestamp })),
        });
        return stored;
      });
    } catch (error) {
      throw new PersistenceError(`Conversation write failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
