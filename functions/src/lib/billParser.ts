/**
 * billParser.ts
 * Turns the text extracted from a telecom invoice PDF into a bill draft.
 * Invoices are matched line by line against known labels, Romanian and English.
 */

import { endOfMonth, format, isValid, parse, startOfMonth, subMonths } from "date-fns";
import { BillDraft, LineItem } from '../types';
import { InvalidRequestError } from './errors';

const ISSUE_DATE_LABELS = ['data emiterii facturii', 'data facturii', 'invoice date', 'issue date'];
const PERIOD_LABELS = ['perioada de facturare', 'billing period'];
// Highest priority first
const TOTAL_LABELS = ['total de plata', 'total due', 'amount due', 'total factura curenta'];
const LINE_ITEM_LABELS: Array<{ label: string; description: string }> = [
  { label: 'abonamente si extraoptiuni', description: 'Subscriptions' },
  { label: 'servicii utilizate', description: 'Usage' },
  { label: 'rate terminal', description: 'Device installments' },
  { label: 'subscriptions', description: 'Subscriptions' },
  { label: 'usage', description: 'Usage' },
  { label: 'device installments', description: 'Device installments' },
];
const VAT_LABELS = ['tva', 'vat'];
// Subtotals printed before VAT share the wording of the real total
const NET_TOTAL_MARKERS = ['fara tva', 'without vat', 'excl. vat', 'excluding vat'];
const CURRENCIES = new Set(['lei', 'ron', 'eur', 'usd', '€', '$']);

const DATE_PATTERN = /\d{2}\.\d{2}\.\d{4}|\d{4}-\d{2}-\d{2}/g;

export function normalizeLine(line: string): string {
  return line
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

// "1.234,56", "1,234.56" and "1234.56" all read as 1234.56
export function parseAmount(token: string): number | null {
  let cleaned = token.replace(/[^\d.,-]/g, '');
  if (cleaned.includes(',') && cleaned.includes('.')) {
    // Whichever separator comes last is the decimal mark
    cleaned = cleaned.lastIndexOf(',') > cleaned.lastIndexOf('.')
      ? cleaned.replace(/\./g, '').replace(',', '.')
      : cleaned.replace(/,/g, '');
  } else {
    cleaned = cleaned.replace(',', '.');
  }
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

// Amount is the last token, or the one before it when the line ends in a currency
export function lineAmount(line: string): number | null {
  const tokens = line.trim().split(/\s+/);
  const last = tokens[tokens.length - 1] ?? '';
  const candidate = CURRENCIES.has(last.toLowerCase()) ? tokens[tokens.length - 2] : last;
  return candidate === undefined ? null : parseAmount(candidate);
}

function parseDate(text: string): Date | null {
  const formatString = text.includes('.') ? 'dd.MM.yyyy' : 'yyyy-MM-dd';
  const date = parse(text, formatString, new Date());
  return isValid(date) ? date : null;
}

const iso = (date: Date) => format(date, 'yyyy-MM-dd');

export function parseBillText(text: string): BillDraft {
  let issueDate: Date | null = null;
  let period: { start: Date; end: Date } | null = null;
  let total: { amount: number; priority: number } | null = null;
  const lineItems: LineItem[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = normalizeLine(rawLine);
    if (!line) continue;

    if (PERIOD_LABELS.some(label => line.includes(label))) {
      const [start, end] = (line.match(DATE_PATTERN) ?? []).map(parseDate);
      if (start && end) {
        period = { start, end };
      }
      continue;
    }

    if (ISSUE_DATE_LABELS.some(label => line.includes(label))) {
      const match = line.match(DATE_PATTERN);
      const date = match ? parseDate(match[match.length - 1]) : null;
      if (date) issueDate = date;
      continue;
    }

    const totalPriority = TOTAL_LABELS.findIndex(label => line.includes(label));
    if (totalPriority >= 0) {
      if (NET_TOTAL_MARKERS.some(marker => line.includes(marker))) continue;
      const amount = lineAmount(rawLine);
      if (amount !== null && (!total || totalPriority < total.priority)) {
        total = { amount, priority: totalPriority };
      }
      continue;
    }

    const item = LINE_ITEM_LABELS.find(entry => line.includes(entry.label));
    const isVat = !item && line.includes('%') && VAT_LABELS.some(label => new RegExp(`\\b${label}\\b`).test(line));
    if (item || isVat) {
      const amount = lineAmount(rawLine);
      if (amount !== null) {
        lineItems.push({ description: item ? item.description : 'VAT', amount });
      }
    }
  }

  if (!period && issueDate) {
    const previousMonth = subMonths(issueDate, 1);
    period = { start: startOfMonth(previousMonth), end: endOfMonth(previousMonth) };
  }
  if (!period) {
    throw new InvalidRequestError('Could not find an invoice date or billing period in the bill text');
  }

  if (!total && lineItems.length === 0) {
    throw new InvalidRequestError('Could not find any amounts in the bill text');
  }
  const amount = total
    ? total.amount
    : Math.round(lineItems.reduce((sum, item) => sum + item.amount, 0) * 100) / 100;

  return {
    periodStart: iso(period.start),
    periodEnd: iso(period.end),
    amount,
    lineItems,
  };
}
