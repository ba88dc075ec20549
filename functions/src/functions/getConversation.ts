import * as logger from "firebase-functions/logger";
import * as functions from "firebase-functions/v1";
import { region } from '../lib/config';
import { requireAuth, toHttpsError } from '../lib/errors';
import { asPayload, targetUserId } from '../lib/payload';
import { getServices, Services } from '../lib/services';
import { assertSameUser } from '../stores/billStore';
import { ContextSummary, Message } from '../types';

export async function handleGetConversation(
  data: unknown,
  uid: string,
  services: Pick<Services, 'contexts'>
): Promise<{ messages: Message[]; summary: ContextSummary }> {
  const userId = targetUserId(asPayload(data), uid);
  assertSameUser(uid, userId);
  const context = await services.contexts.load(userId);
  return { messages: [...context.messages], summary: services.contexts.summarize(context) };
}

export const getConversation = functions.region(region).https.onCall(
  async (data, context) => {
    const uid = requireAuth(context);
    try {
      return await handleGetConversation(data, uid, getServices());
    } catch (error) {
      logger.error(`Error loading conversation for ${uid}:`, error);
      throw toHttpsError(error);
    }
  }
);
