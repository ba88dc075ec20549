import { BillRepository } from '../stores/billStore';
import { ConversationRepository } from '../stores/conversationStore';
import { ProfileRepository } from '../stores/userInfo';
import { Bill, BillDraft, BillingAccount, ConversationContext, Message, UserProfile } from '../types';
import { PersistenceError } from '../lib/errors';

/**
 * In-process stand-ins for the Firestore repositories. Stored values are
 * copied on the way in and out, like a real database round trip.
 */
export class InMemoryBillRepository implements BillRepository {
  readonly accounts = new Map<string, BillingAccount>();
  readonly bills = new Map<string, Bill[]>();
  private nextId = 1;

  addAccount(userId: string, displayName = '', accountReference = ''): this {
    this.accounts.set(userId, { userId, displayName, accountReference });
    if (!this.bills.has(userId)) this.bills.set(userId, []);
    return this;
  }

  seed(userId: string, bills: Array<Omit<Bill, 'userId'>>): this {
    if (!this.accounts.has(userId)) this.addAccount(userId);
    this.bills.get(userId)?.push(...bills.map(bill => ({ ...bill, userId })));
    return this;
  }

  async findAccount(userId: string): Promise<BillingAccount | null> {
    const account = this.accounts.get(userId);
    return account ? { ...account } : null;
  }

  async listBills(userId: string): Promise<Bill[]> {
    return (this.bills.get(userId) ?? []).map(bill => ({ ...bill, lineItems: [...bill.lineItems] }));
  }

  async insertBill(userId: string, draft: BillDraft): Promise<Bill> {
    const bill: Bill = { billId: `bill-${this.nextId++}`, userId, ...draft };
    this.bills.get(userId)?.push(bill);
    return { ...bill };
  }
}

export class InMemoryProfileRepository implements ProfileRepository {
  readonly profiles = new Map<string, UserProfile>();
  failing = false;

  private check(): void {
    if (this.failing) throw new PersistenceError('Profile store unreachable');
  }

  async get(userId: string): Promise<UserProfile | null> {
    this.check();
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : null;
  }

  async createIfAbsent(profile: UserProfile): Promise<UserProfile> {
    this.check();
    const existing = this.profiles.get(profile.userId);
    if (existing) return { ...existing };
    this.profiles.set(profile.userId, { ...profile });
    return { ...profile };
  }

  async put(profile: UserProfile): Promise<void> {
    this.check();
    this.profiles.set(profile.userId, { ...profile });
  }
}

export class InMemoryConversationRepository implements ConversationRepository {
  readonly stored = new Map<string, ConversationContext>();
  failing = false;
  saves = 0;

  async load(userId: string): Promise<ConversationContext | null> {
    if (this.failing) throw new PersistenceError('Conversation store unreachable');
    const context = this.stored.get(userId);
    return context ? { ...context, messages: [...context.messages] } : null;
  }

  async append(userId: string, createdAt: string, messages: readonly Message[]): Promise<ConversationContext> {
    if (this.failing) throw new PersistenceError('Conversation store unreachable');
    this.saves++;
    const existing = this.stored.get(userId);
    const stored: ConversationContext = {
      userId,
      createdAt: existing?.createdAt ?? createdAt,
      messages: [...(existing?.messages ?? []), ...messages],
    };
    this.stored.set(userId, stored);
    return { ...stored, messages: [...stored.messages] };
  }
}
