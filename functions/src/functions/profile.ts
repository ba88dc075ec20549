import * as logger from "firebase-functions/logger";
import * as functions from "firebase-functions/v1";
import { region } from '../lib/config';
import { InvalidRequestError, requireAuth, toHttpsError, UnknownUserError } from '../lib/errors';
import { asPayload, optionalString, targetUserId } from '../lib/payload';
import { getServices, Services } from '../lib/services';
import { assertSameUser } from '../stores/billStore';
import { ProfileChanges, UserProfile } from '../types';

// Defaults for a profile created on first access: the billing account's
// details when the user has one, else the name on the auth token
async function profileSeed(
  services: Pick<Services, 'scopeFor'>,
  userId: string,
  fallbackName?: string
): Promise<ProfileChanges> {
  try {
    const account = await services.scopeFor(userId).billStore.getAccount(userId);
    return {
      displayName: account.displayName || fallbackName,
      accountReference: account.accountReference,
    };
  } catch (error) {
    if (error instanceof UnknownUserError) {
      return fallbackName ? { displayName: fallbackName } : {};
    }
    throw error;
  }
}

export async function handleGetProfile(
  data: unknown,
  uid: string,
  services: Pick<Services, 'profiles' | 'scopeFor'>,
  displayName?: string
): Promise<UserProfile> {
  const userId = targetUserId(asPayload(data), uid);
  assertSameUser(uid, userId);
  return services.profiles.loadProfile(userId, await profileSeed(services, userId, displayName));
}

export async function handleUpdateProfile(
  data: unknown,
  uid: string,
  services: Pick<Services, 'profiles' | 'scopeFor'>
): Promise<UserProfile> {
  const payload = asPayload(data);
  const userId = targetUserId(payload, uid);
  assertSameUser(uid, userId);

  const changes: ProfileChanges = {};
  const displayName = optionalString(payload, 'displayName');
  const accountReference = optionalString(payload, 'accountReference');
  if (displayName !== undefined) changes.displayName = displayName.trim();
  if (accountReference !== undefined) changes.accountReference = accountReference.trim();
  if (Object.keys(changes).length === 0) {
    throw new InvalidRequestError('Nothing to update, pass displayName or accountReference');
  }
  return services.profiles.updateProfile(userId, changes, await profileSeed(services, userId));
}

export const getProfile = functions.region(region).https.onCall(
  async (data, context) => {
    const uid = requireAuth(context);
    try {
      const tokenName = context.auth?.token.name;
      return await handleGetProfile(data, uid, getServices(), typeof tokenName === 'string' ? tokenName : undefined);
    } catch (error) {
      logger.error(`Error loading profile for ${uid}:`, error);
      throw toHttpsError(error);
    }
  }
);

export const updateProfile = functions.region(region).https.onCall(
  async (data, context) => {
    const uid = requireAuth(context);
    try {
      const profile = await handleUpdateProfile(data, uid, getServices());
      logger.info(`Updated profile for ${uid}`);
      return profile;
    } catch (error) {
      logger.error(`Error updating profile for ${uid}:`, error);
      throw toHttpsError(error);
    }
  }
);
