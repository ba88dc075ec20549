import { endOfMonth, format, isValid, parse, startOfMonth } from "date-fns";
import { BillingPeriod } from '../types';

export type Intent =
  | { kind: 'comparison' }
  | { kind: 'general'; period?: BillingPeriod };

export interface IntentClassifier {
  classify(utterance: string): Intent;
}

const COMPARISON_TERMS = [
  'compare',
  'comparison',
  'versus',
  'vs',
  'difference',
  'differ',
  'trend',
  'changed',
  'increase',
  'increased',
  'decrease',
  'decreased',
  'went up',
  'went down',
  'higher than',
  'lower than',
  'more than last',
  'less than last',
  'last four',
  'last 4',
  'previous bills',
  'compara',
  'comparatie',
  'diferenta',
  'crescut',
  'scazut',
];

const MONTH_PATTERN =
  /\b(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\s+(\d{4})\b/i;
const ISO_MONTH_PATTERN = /\b(\d{4})-(\d{2})\b/;

function monthPeriod(month: Date): BillingPeriod {
  return {
    start: format(startOfMonth(month), 'yyyy-MM-dd'),
    end: format(endOfMonth(month), 'yyyy-MM-dd'),
  };
}

// "March 2024", "mar 2024" or "2024-03"
export function extractPeriod(utterance: string): BillingPeriod | undefined {
  const named = MONTH_PATTERN.exec(utterance);
  if (named) {
    const month = parse(`${named[1].slice(0, 3)} ${named[2]}`, 'MMM yyyy', new Date());
    if (isValid(month)) return monthPeriod(month);
  }
  const iso = ISO_MONTH_PATTERN.exec(utterance);
  if (iso) {
    const month = parse(`${iso[1]}-${iso[2]}`, 'yyyy-MM', new Date());
    if (isValid(month)) return monthPeriod(month);
  }
  return undefined;
}

function containsTerm(text: string, term: string): boolean {
  const escaped = term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^\\p{L}\\p{N}])${escaped}($|[^\\p{L}\\p{N}])`, 'u').test(text);
}

/** Keyword heuristic: any comparison term makes the turn a comparison query. */
export class KeywordIntentClassifier implements IntentClassifier {
  constructor(private readonly terms: readonly string[] = COMPARISON_TERMS) {}

  classify(utterance: string): Intent {
    const normalized = utterance
      .toLowerCase()
      .normalize('NFD')
      .replace(/[\u0300-\u036f]/g, '');

    if (this.terms.some(term => containsTerm(normalized, term))) {
      return { kind: 'comparison' };
    }
    const period = extractPeriod(utterance);
    return period ? { kind: 'general', period } : { kind: 'general' };
  }
}
