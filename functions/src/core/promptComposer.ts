import { PromptTooLargeError } from '../lib/errors';
import { Bill, BillComparisonResult, BillDelta, BillingPeriod, Message, UserProfile } from '../types';

export type ScopedData =
  | { kind: 'comparison'; result: BillComparisonResult }
  | { kind: 'bills'; bills: Bill[]; period?: BillingPeriod };

export interface PromptInput {
  profile: UserProfile;
  history: Message[];
  utterance: string;
  data: ScopedData;
}

export interface ComposedPrompt {
  text: string;
  historyUsed: number;
  focus: string[];
}

export const SYSTEM_INSTRUCTION =
  'You are a telecom billing assistant. Answer the customer\'s question using only the billing data below. ' +
  'If the data does not answer the question, say so.';

export function formatAmount(value: number): string {
  return value.toFixed(2);
}

function signed(value: number, text: string): string {
  return value > 0 ? `+${text}` : text;
}

export function renderBill(bill: Bill): string {
  const lines = [`- ${bill.billId} | ${bill.periodStart} to ${bill.periodEnd} | total ${formatAmount(bill.amount)}`];
  for (const item of bill.lineItems) {
    lines.push(`    ${item.description}: ${formatAmount(item.amount)}`);
  }
  return lines.join('\n');
}

export function renderDelta(delta: BillDelta): string {
  const amount = signed(delta.amountDelta, formatAmount(delta.amountDelta));
  const percent = signed(delta.percentChange, `${(delta.percentChange * 100).toFixed(1)}%`);
  const flags = delta.flags.length ? ` [${delta.flags.join(', ')}]` : '';
  return `- ${delta.fromBillId} -> ${delta.toBillId}: ${amount} (${percent})${flags}`;
}

export function renderScopedData(data: ScopedData): string {
  const bills = data.kind === 'comparison' ? data.result.billsCompared : data.bills;
  let heading: string;
  if (data.kind === 'comparison') {
    heading = `Billing data (comparison of the last ${bills.length} bills, most recent first):`;
  } else if (data.period) {
    heading = `Billing data (bills overlapping ${data.period.start} to ${data.period.end}):`;
  } else {
    heading = 'Billing data (all bills, most recent first):';
  }

  const lines = [heading];
  if (bills.length === 0) {
    lines.push('No bills on record.');
  }
  lines.push(...bills.map(renderBill));
  if (data.kind === 'comparison' && data.result.deltas.length > 0) {
    lines.push('Changes:');
    lines.push(...data.result.deltas.map(renderDelta));
  }
  return lines.join('\n');
}

// Line items the customer names in the question, in first-seen order
export function findFocus(utterance: string, data: ScopedData): string[] {
  const bills = data.kind === 'comparison' ? data.result.billsCompared : data.bills;
  const question = utterance.toLowerCase();
  const focus = new Set<string>();
  for (const bill of bills) {
    for (const item of bill.lineItems) {
      if (item.description && question.includes(item.description.toLowerCase())) {
        focus.add(item.description);
      }
    }
  }
  return [...focus];
}

function renderHistory(history: Message[]): string {
  if (history.length === 0) return 'Conversation so far:\n(none)';
  return ['Conversation so far:', ...history.map(m => `${m.role}: ${m.text}`)].join('\n');
}

/**
 * Builds the completion prompt. When the result is longer than `maxChars`
 * the oldest history messages are dropped first; a prompt that is still too
 * long with no history at all is rejected.
 */
export function composePrompt(input: PromptInput, maxChars: number): ComposedPrompt {
  const { profile, utterance, data } = input;
  const focus = findFocus(utterance, data);
  const customer = profile.displayName || profile.userId;
  const account = profile.accountReference || 'n/a';

  const head = [
    SYSTEM_INSTRUCTION,
    `Customer: ${customer} (account ${account})`,
    renderScopedData(data),
  ];
  const tail = [
    ...(focus.length ? [`Question focus: ${focus.join(', ')}`] : []),
    `Question: ${utterance}`,
  ].join('\n');

  let history = input.history;
  for (;;) {
    const text = [...head, renderHistory(history), tail].join('\n\n');
    if (text.length <= maxChars) {
      return { text, historyUsed: history.length, focus };
    }
    if (history.length === 0) {
      throw new PromptTooLargeError(text.length, maxChars);
    }
    history = history.slice(1);
  }
}
