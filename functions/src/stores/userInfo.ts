import { DocumentData, Firestore } from "firebase-admin/firestore";
import * as logger from "firebase-functions/logger";
import { errorMessage, InvalidRequestError, PersistenceError } from '../lib/errors';
import { KeyedSerializer } from '../lib/keyedSerializer';
import { ProfileChanges, UserProfile } from '../types';

export interface ProfileRepository {
  get(userId: string): Promise<UserProfile | null>;
  /** Stores `profile` unless one already exists; returns whichever is stored. */
  createIfAbsent(profile: UserProfile): Promise<UserProfile>;
  put(profile: UserProfile): Promise<void>;
}

const PROFILES = 'userProfiles';

export class FirestoreProfileRepository implements ProfileRepository {
  constructor(private readonly db: Firestore) {}

  private toProfile(userId: string, d: DocumentData): UserProfile {
    return {
      userId,
      displayName: String(d.displayName ?? ''),
      accountReference: String(d.accountReference ?? ''),
      createdAt: String(d.createdAt ?? ''),
      updatedAt: String(d.updatedAt ?? ''),
    };
  }

  async get(userId: string): Promise<UserProfile | null> {
    try {
      const snapshot = await this.db.collection(PROFILES).doc(userId).get();
      const d = snapshot.data();
      return d ? this.toProfile(userId, d) : null;
    } catch (error) {
      throw new PersistenceError(`Profile read failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async createIfAbsent(profile: UserProfile): Promise<UserProfile> {
    const ref = this.db.collection(PROFILES).doc(profile.userId);
    try {
      return await this.db.runTransaction(async tx => {
        const snapshot = await tx.get(ref);
        const existing = snapshot.data();
        if (existing) {
          return this.toProfile(profile.userId, existing);
        }
        tx.set(ref, {
          displayName: profile.displayName,
          accountReference: profile.accountReference,
          createdAt: profile.createdAt,
          updatedAt: profile.updatedAt,
        });
        return profile;
      });
    } catch (error) {
      throw new PersistenceError(`Profile creation failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async put(profile: UserProfile): Promise<void> {
    try {
      await this.db.collection(PROFILES).doc(profile.userId).set({
        displayName: profile.displayName,
        accountReference: profile.accountReference,
        createdAt: profile.createdAt,
        updatedAt: profile.updatedAt,
      });
    } catch (error) {
      throw new PersistenceError(`Profile write failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Keeps the signed-in user's profile. Writes for one user are serialized
 * and awaited, so a `loadProfile` issued after `saveProfile` resolves
 * always sees the saved values.
 */
export class UserInfoManager {
  constructor(
    private readonly repository: ProfileRepository,
    private readonly writes = new KeyedSerializer(),
    private readonly now: () => Date = () => new Date()
  ) {}

  async loadProfile(userId: string, seed: ProfileChanges = {}): Promise<UserProfile> {
    const existing = await this.repository.get(userId);
    if (existing) return existing;

    const timestamp = this.now().toISOString();
    const created = await this.writes.run(userId, () =>
      this.repository.createIfAbsent({
        userId,
        displayName: seed.displayName ?? '',
        accountReference: seed.accountReference ?? '',
        createdAt: timestamp,
        updatedAt: timestamp,
      })
    );
    logger.info(`Profile ready for ${userId}`);
    return created;
  }

  async saveProfile(profile: UserProfile): Promise<UserProfile> {
    if (!profile.userId) {
      throw new InvalidRequestError('Profile is missing a user id');
    }
    const saved = { ...profile, updatedAt: this.now().toISOString() };
    await this.writes.run(profile.userId, () => this.repository.put(saved));
    return saved;
  }

  async updateProfile(userId: string, changes: ProfileChanges, seed: ProfileChanges = {}): Promise<UserProfile> {
    const current = await this.loadProfile(userId, seed);
    return this.saveProfile({
      ...current,
      displayName: changes.displayName ?? current.displayName,
      accountReference: changes.accountReference ?? current.accountReference,
    });
  }
}
