import { BillStore } from '../stores/billStore';
import { Bill, BillComparisonResult, BillDelta, BillFlag } from '../types';

export const MAX_COMPARED_BILLS = 4;

export interface ComparisonOptions {
  anomalyThreshold: number;
}

export function percentChange(previous: number, current: number): number {
  if (previous === 0) return 0;
  return (current - previous) / previous;
}

export function flagsFor(change: number, anomalyThreshold: number): BillFlag[] {
  const flags: BillFlag[] = [];
  if (change > 0) flags.push('increase');
  if (change < 0) flags.push('decrease');
  if (Math.abs(change) > anomalyThreshold) flags.push('anomaly');
  return flags;
}

/**
 * Walks a most-recent-first list pairwise: each bill is `previous` to the one
 * listed after it, so a bill that dropped from 200 to 90 reads as -110 (-55%).
 * Deltas follow the order of `billsCompared`.
 */
export function compareBills(
  userId: string,
  mostRecentFirst: Bill[],
  options: ComparisonOptions
): BillComparisonResult {
  const billsCompared = mostRecentFirst.slice(0, MAX_COMPARED_BILLS);
  const deltas: BillDelta[] = [];

  for (let i = 0; i < billsCompared.length - 1; i++) {
    const previous = billsCompared[i];
    const current = billsCompared[i + 1];
    const change = percentChange(previous.amount, current.amount);
    deltas.push({
      fromBillId: previous.billId,
      toBillId: current.billId,
      amountDelta: current.amount - previous.amount,
      percentChange: change,
      flags: flagsFor(change, options.anomalyThreshold),
    });
  }

  const flags = new Set<BillFlag>(deltas.flatMap(d => d.flags));
  return { userId, billsCompared, deltas, flags: [...flags] };
}

/**
 * Comparison over one user's bills. Built per request around a store that is
 * already bound to that user.
 */
export class BillComparisonEngine {
  constructor(
    private readonly store: BillStore,
    private readonly options: ComparisonOptions
  ) {}

  async compare(userId: string): Promise<BillComparisonResult> {
    const bills = await this.store.getBills(userId);
    return compareBills(userId, bills, this.options);
  }
}
