import { InvalidRequestError } from './errors';

type Payload = Record<string, unknown>;

export function asPayload(data: unknown): Payload {
  if (data === null || data === undefined) return {};
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new InvalidRequestError('Request data must be an object');
  }
  return Object.fromEntries(Object.entries(data));
}

export function optionalString(payload: Payload, key: string): string | undefined {
  const value = payload[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidRequestError(`${key} must be a string`);
  }
  return value;
}

export function requireString(payload: Payload, key: string): string {
  const value = optionalString(payload, key);
  if (value === undefined || value.trim() === '') {
    throw new InvalidRequestError(`${key} is required`);
  }
  return value;
}

// The caller may name its own user id; when omitted, the signed-in user is meant
export function targetUserId(payload: Payload, uid: string): string {
  return optionalString(payload, 'userId') ?? uid;
}
