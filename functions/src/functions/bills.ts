import * as logger from "firebase-functions/logger";
import * as functions from "firebase-functions/v1";
import { parseBillText } from '../lib/billParser';
import { region } from '../lib/config';
import { requireAuth, toHttpsError } from '../lib/errors';
import { asPayload, requireString, targetUserId } from '../lib/payload';
import { getServices, Services } from '../lib/services';
import { Bill, BillComparisonResult } from '../types';

export async function handleCompareBills(
  data: unknown,
  uid: string,
  services: Pick<Services, 'scopeFor'>
): Promise<BillComparisonResult> {
  const userId = targetUserId(asPayload(data), uid);
  return services.scopeFor(uid).comparison.compare(userId);
}

export async function handleImportBill(
  data: unknown,
  uid: string,
  services: Pick<Services, 'scopeFor'>
): Promise<Bill> {
  const payload = asPayload(data);
  const userId = targetUserId(payload, uid);
  const draft = parseBillText(requireString(payload, 'text'));
  return services.scopeFor(uid).billStore.addBill(userId, draft);
}

export const compareBills = functions.region(region).https.onCall(
  async (data, context) => {
    const uid = requireAuth(context);
    try {
      return await handleCompareBills(data, uid, getServices());
    } catch (error) {
      logger.error(`Error comparing bills for ${uid}:`, error);
      throw toHttpsError(error);
    }
  }
);

export const importBill = functions.region(region).https.onCall(
  async (data, context) => {
    const uid = requireAuth(context);
    try {
      const bill = await handleImportBill(data, uid, getServices());
      return {
        success: true,
        message: `Imported bill for ${bill.periodStart} to ${bill.periodEnd}`,
        bill,
      };
    } catch (error) {
      logger.error(`Error importing bill for ${uid}:`, error);
      throw toHttpsError(error);
    }
  }
);
