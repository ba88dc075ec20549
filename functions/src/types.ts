//functions/src/types.ts

// ── Billing ──────────────────────────────────────────────────────────────────
export interface LineItem {
  description: string;
  amount: number;
}

export interface Bill {
  billId: string;
  userId: string;
  periodStart: string; // yyyy-MM-dd
  periodEnd: string; // yyyy-MM-dd
  amount: number;
  lineItems: LineItem[];
}

export type BillDraft = Omit<Bill, 'billId' | 'userId'>;

export interface BillingPeriod {
  start: string;
  end: string;
}

export type BillFlag = 'increase' | 'decrease' | 'anomaly';

export interface BillDelta {
  fromBillId: string;
  toBillId: string;
  amountDelta: number;
  percentChange: number;
  flags: BillFlag[];
}

export interface BillComparisonResult {
  userId: string;
  billsCompared: Bill[]; // most recent first
  deltas: BillDelta[];
  flags: BillFlag[];
}

// ── Profile ──────────────────────────────────────────────────────────────────
export interface UserProfile {
  userId: string;
  displayName: string;
  accountReference: string;
  createdAt: string;
  updatedAt: string;
}

export type ProfileChanges = Partial<Pick<UserProfile, 'displayName' | 'accountReference'>>;

export interface BillingAccount {
  userId: string;
  displayName: string;
  accountReference: string;
}

// ── Conversation ─────────────────────────────────────────────────────────────
export type MessageRole = 'user' | 'assistant';

export interface Message {
  readonly role: MessageRole;
  readonly text: string;
  readonly timestamp: string;
}

export interface ConversationContext {
  readonly userId: string;
  readonly messages: readonly Message[];
  readonly createdAt: string;
}

export interface ContextSummary {
  userId: string;
  messageCount: number;
  turnCount: number;
  lastMessageAt: string | null;
}

// ── Turn boundary ────────────────────────────────────────────────────────────
export interface TurnRequest {
  userId: string;
  utterance: string;
}

export interface TurnResponse {
  assistantText: string;
  contextSummary: ContextSummary;
}

export type TurnState =
  | 'idle'
  | 'classifying'
  | 'fetching'
  | 'composing'
  | 'awaitingCompletion'
  | 'appending'
  | 'failed';
