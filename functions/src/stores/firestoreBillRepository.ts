import { DocumentData, Firestore, Timestamp } from "firebase-admin/firestore";
import * as logger from "firebase-functions/logger";
import { errorMessage, PersistenceError } from '../lib/errors';
import { Bill, BillDraft, BillingAccount, LineItem } from '../types';
import { BillRepository } from './billStore';

const ACCOUNTS = 'billingAccounts';
const BILLS = 'bills';

function toLineItems(raw: unknown): LineItem[] {
  if (!Array.isArray(raw)) return [];
  return raw.map((item: DocumentData) => ({
    description: String(item.description ?? ''),
    amount: Number(item.amount ?? 0),
  }));
}

export function toBill(billId: string, userId: string, d: DocumentData): Bill {
  return {
    billId,
    userId,
    periodStart: String(d.periodStart ?? d.period_start),
    periodEnd: String(d.periodEnd ?? d.period_end),
    amount: Number(d.amount ?? 0),
    lineItems: toLineItems(d.lineItems ?? d.line_items),
  };
}

/**
 * Billing records live under `billingAccounts/{userId}/bills`. The account
 * document holds the subscriber's name and account number.
 */
export class FirestoreBillRepository implements BillRepository {
  constructor(private readonly db: Firestore) {}

  async findAccount(userId: string): Promise<BillingAccount | null> {
    try {
      const snapshot = await this.db.collection(ACCOUNTS).doc(userId).get();
      if (!snapshot.exists) return null;
      const d = snapshot.data() ?? {};
      return {
        userId,
        displayName: String(d.displayName ?? ''),
        accountReference: String(d.accountReference ?? ''),
      };
    } catch (error) {
      logger.error(`Error reading billing account ${userId}:`, error);
      throw new PersistenceError(`Billing account lookup failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async listBills(userId: string): Promise<Bill[]> {
    try {
      const snapshot = await this.db.collection(ACCOUNTS).doc(userId).collection(BILLS).get();
      return snapshot.docs.map(doc => toBill(doc.id, userId, doc.data()));
    } catch (error) {
      logger.error(`Error fetching bills for ${userId}:`, error);
      throw new PersistenceError(`Bill lookup failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async insertBill(userId: string, draft: BillDraft): Promise<Bill> {
    try {
      const docRef = this.db.collection(ACCOUNTS).doc(userId).collection(BILLS).doc();
      // create() fails instead of overwriting, issued bills are immutable
      await docRef.create({
        periodStart: draft.periodStart,
        periodEnd: draft.periodEnd,
        amount: draft.amount,
        lineItems: draft.lineItems.map(item => ({ description: item.description, amount: item.amount })),
        issuedAt: Timestamp.now(),
      });
      logger.info(`Stored bill ${docRef.id} for ${userId}`);
      return { billId: docRef.id, userId, ...draft };
    } catch (error) {
      logger.error(`Error storing bill for ${userId}:`, error);
      throw new PersistenceError(`Bill import failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
