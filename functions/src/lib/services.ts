import { Firestore, getFirestore } from "firebase-admin/firestore";
import * as functions from "firebase-functions/v1";
import { BillComparisonEngine } from '../core/billComparison';
import { GeminiCompletionService } from '../core/completion';
import { ConversationContextManager } from '../core/conversationContext';
import { KeywordIntentClassifier } from '../core/intentClassifier';
import { ConversationOrchestrator, UserScope } from '../core/orchestrator';
import { ScopedBillStore } from '../stores/billStore';
import { FirestoreConversationRepository } from '../stores/conversationStore';
import { FirestoreBillRepository } from '../stores/firestoreBillRepository';
import { FirestoreProfileRepository, UserInfoManager } from '../stores/userInfo';
import { AssistantConfig, loadConfig } from './config';
import { KeyedSerializer } from './keyedSerializer';

export interface Services {
  config: AssistantConfig;
  profiles: UserInfoManager;
  contexts: ConversationContextManager;
  scopeFor(authenticatedUserId: string): UserScope;
}

export function createServices(db: Firestore, config: AssistantConfig): Services {
  const writes = new KeyedSerializer();
  const bills = new FirestoreBillRepository(db);

  return {
    config,
    profiles: new UserInfoManager(new FirestoreProfileRepository(db), writes),
    contexts: new ConversationContextManager(new FirestoreConversationRepository(db), config.historyWindow, writes),
    scopeFor(authenticatedUserId: string): UserScope {
      const billStore = new ScopedBillStore(bills, authenticatedUserId);
      return {
        billStore,
        comparison: new BillComparisonEngine(billStore, { anomalyThreshold: config.anomalyThreshold }),
      };
    },
  };
}

// Function instances are reused between invocations, so sessions outlive a single call
let services: Services | null = null;
let orchestrator: ConversationOrchestrator | null = null;

export function getServices(): Services {
  if (!services) {
    services = createServices(getFirestore(), loadConfig());
  }
  return services;
}

export function getOrchestrator(): ConversationOrchestrator {
  if (orchestrator) return orchestrator;

  const { config, profiles, contexts, scopeFor } = getServices();
  if (!config.geminiApiKey) {
    throw new functions.https.HttpsError('failed-precondition', 'Missing gemini.api_key in Firebase config');
  }
  orchestrator = new ConversationOrchestrator({
    scopeFor,
    profiles,
    contexts,
    classifier: new KeywordIntentClassifier(),
    completion: new GeminiCompletionService(config.geminiApiKey, config.geminiModel),
    config,
  });
  return orchestrator;
}
