import { areIntervalsOverlapping, parseISO } from "date-fns";
import { AccessDeniedError, NotFoundError, UnknownUserError } from '../lib/errors';
import { Bill, BillDraft, BillingAccount, BillingPeriod } from '../types';

/** Raw access to the billing system, one account per user. */
export interface BillRepository {
  findAccount(userId: string): Promise<BillingAccount | null>;
  listBills(userId: string): Promise<Bill[]>;
  insertBill(userId: string, draft: BillDraft): Promise<Bill>;
}

export interface BillStore {
  getBills(userId: string, period?: BillingPeriod): Promise<Bill[]>;
  getBill(userId: string, billId: string): Promise<Bill>;
  addBill(userId: string, draft: BillDraft): Promise<Bill>;
  getAccount(userId: string): Promise<BillingAccount>;
}

export function assertSameUser(authenticatedUserId: string, requestedUserId: string): void {
  if (requestedUserId !== authenticatedUserId) {
    throw new AccessDeniedError(requestedUserId);
  }
}

// Most recent first by period end; ties fall back to period start, then id
export function sortMostRecentFirst(bills: Bill[]): Bill[] {
  return [...bills].sort((a, b) =>
    b.periodEnd.localeCompare(a.periodEnd) ||
    b.periodStart.localeCompare(a.periodStart) ||
    b.billId.localeCompare(a.billId)
  );
}

export function overlapsPeriod(bill: Bill, period: BillingPeriod): boolean {
  return areIntervalsOverlapping(
    { start: parseISO(bill.periodStart), end: parseISO(bill.periodEnd) },
    { start: parseISO(period.start), end: parseISO(period.end) },
    { inclusive: true }
  );
}

/**
 * Bill access bound to the caller's authenticated identity. Every method
 * takes the user id only to check it against that identity, so there is no
 * way to ask this store for someone else's bills.
 */
export class ScopedBillStore implements BillStore {
  constructor(
    private readonly repository: BillRepository,
    readonly authenticatedUserId: string
  ) {}

  async getAccount(userId: string): Promise<BillingAccount> {
    assertSameUser(this.authenticatedUserId, userId);
    const account = await this.repository.findAccount(userId);
    if (!account) {
      throw new UnknownUserError(userId);
    }
    return account;
  }

  async getBills(userId: string, period?: BillingPeriod): Promise<Bill[]> {
    await this.getAccount(userId);
    const owned = (await this.repository.listBills(userId)).filter(bill => bill.userId === userId);
    const sorted = sortMostRecentFirst(owned);
    return period ? sorted.filter(bill => overlapsPeriod(bill, period)) : sorted;
  }

  async getBill(userId: string, billId: string): Promise<Bill> {
    const bill = (await this.getBills(userId)).find(b => b.billId === billId);
    if (!bill) {
      throw new NotFoundError(`Bill ${billId} not found`);
    }
    return bill;
  }

  async addBill(userId: string, draft: BillDraft): Promise<Bill> {
    await this.getAccount(userId);
    return this.repository.insertBill(userId, draft);
  }
}
