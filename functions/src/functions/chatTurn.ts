import * as logger from "firebase-functions/logger";
import * as functions from "firebase-functions/v1";
import { ConversationOrchestrator } from '../core/orchestrator';
import { region } from '../lib/config';
import { requireAuth, toHttpsError } from '../lib/errors';
import { asPayload, requireString, targetUserId } from '../lib/payload';
import { getOrchestrator } from '../lib/services';
import { TurnResponse } from '../types';

export async function handleChatTurn(
  data: unknown,
  uid: string,
  orchestrator: ConversationOrchestrator
): Promise<TurnResponse> {
  const payload = asPayload(data);
  return orchestrator.handleTurn(uid, {
    userId: targetUserId(payload, uid),
    utterance: requireString(payload, 'utterance'),
  });
}

export const chatTurn = functions
  .region(region)
  .runWith({
    timeoutSeconds: 120 // covers the completion timeout plus persistence
  })
  .https.onCall(async (data, context) => {
    const uid = requireAuth(context);
    try {
      return await handleChatTurn(data, uid, getOrchestrator());
    } catch (error) {
      logger.error(`Chat turn failed for ${uid}:`, error);
      throw toHttpsError(error);
    }
  });
