import * as logger from "firebase-functions/logger";
import { AssistantConfig } from '../lib/config';
import { errorMessage, InvalidRequestError, TurnInProgressError } from '../lib/errors';
import { assertSameUser, BillStore } from '../stores/billStore';
import { UserInfoManager } from '../stores/userInfo';
import { TurnRequest, TurnResponse, TurnState } from '../types';
import { BillComparisonEngine } from './billComparison';
import { CompletionService, completeWithin } from './completion';
import { ConversationContextManager, createMessage } from './conversationContext';
import { IntentClassifier } from './intentClassifier';
import { composePrompt, ScopedData } from './promptComposer';

/** Everything a turn may read, bound to one authenticated user. */
export interface UserScope {
  billStore: BillStore;
  comparison: BillComparisonEngine;
}

export interface TurnTransition {
  userId: string;
  from: TurnState;
  to: TurnState;
}

export interface OrchestratorDeps {
  scopeFor: (authenticatedUserId: string) => UserScope;
  profiles: UserInfoManager;
  contexts: ConversationContextManager;
  classifier: IntentClassifier;
  completion: CompletionService;
  config: Pick<AssistantConfig, 'historyWindow' | 'completionTimeoutMs' | 'maxPromptChars'>;
  onTransition?: (transition: TurnTransition) => void;
  now?: () => Date;
}

/**
 * Drives one conversation turn per call:
 * idle → classifying → fetching → composing → awaitingCompletion → appending → idle.
 *
 * Only the turn state of a user is kept between calls; history is loaded from
 * the store at the start of every turn, since another function instance may
 * have served the previous one. Nothing is written unless the turn succeeds.
 */
export class ConversationOrchestrator {
  // Users with a turn in flight; absent means idle
  private readonly states = new Map<string, TurnState>();
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  stateOf(userId: string): TurnState {
    return this.states.get(userId) ?? 'idle';
  }

  private transition(userId: string, to: TurnState): void {
    const from = this.stateOf(userId);
    if (to === 'idle') {
      this.states.delete(userId);
    } else {
      this.states.set(userId, to);
    }
    logger.debug('Turn state', { userId, from, to });
    this.deps.onTransition?.({ userId, from, to });
  }

  async handleTurn(authenticatedUserId: string, request: TurnRequest): Promise<TurnResponse> {
    assertSameUser(authenticatedUserId, request.userId);
    const utterance = request.utterance.trim();
    if (!utterance) {
      throw new InvalidRequestError('Utterance must not be empty');
    }

    const userId = request.userId;
    if (this.stateOf(userId) !== 'idle') {
      throw new TurnInProgressError(userId);
    }

    // Claimed synchronously, before the first await
    this.transition(userId, 'classifying');
    try {
      return await this.runTurn(userId, authenticatedUserId, utterance);
    } catch (error) {
      this.transition(userId, 'failed');
      logger.warn(`Turn failed for ${userId}: ${errorMessage(error)}`);
      throw error;
    } finally {
      this.transition(userId, 'idle');
    }
  }

  private async runTurn(userId: string, authenticatedUserId: string, utterance: string): Promise<TurnResponse> {
    const { contexts, profiles, classifier, config } = this.deps;
    const scope = this.deps.scopeFor(authenticatedUserId);

    const context = await contexts.load(userId);
    const intent = classifier.classify(utterance);

    this.transition(userId, 'fetching');
    const account = await scope.billStore.getAccount(userId);
    const profile = await profiles.loadProfile(userId, {
      displayName: account.displayName,
      accountReference: account.accountReference,
    });
    let data: ScopedData;
    if (intent.kind === 'comparison') {
      data = { kind: 'comparison', result: await scope.comparison.compare(userId) };
    } else {
      data = { kind: 'bills', bills: await scope.billStore.getBills(userId, intent.period), period: intent.period };
    }

    this.transition(userId, 'composing');
    const prompt = composePrompt(
      { profile, history: contexts.window(context, config.historyWindow), utterance, data },
      config.maxPromptChars
    );

    this.transition(userId, 'awaitingCompletion');
    const asked = this.now();
    const answer = await completeWithin(this.deps.completion, prompt.text, config.completionTimeoutMs);

    this.transition(userId, 'appending');
    const withQuestion = contexts.append(context, createMessage('user', utterance, asked));
    const updated = contexts.append(withQuestion, createMessage('assistant', answer, this.now()));
    const stored = await contexts.persist(updated, context);

    logger.info(`Completed ${intent.kind} turn for ${userId}`, { historyUsed: prompt.historyUsed });
    return { assistantText: answer, contextSummary: contexts.summarize(stored) };
  }
}
