import * as logger from "firebase-functions/logger";
import * as functions from "firebase-functions/v1";

export const region = 'us-central1';

export interface AssistantConfig {
  anomalyThreshold: number;
  historyWindow: number;
  completionTimeoutMs: number;
  maxPromptChars: number;
  geminiModel: string;
  geminiApiKey: string | null;
}

export const defaultConfig: AssistantConfig = {
  anomalyThreshold: 0.25,
  historyWindow: 10,
  completionTimeoutMs: 60000,
  maxPromptChars: 12000,
  geminiModel: 'gemini-2.0-flash',
  geminiApiKey: null,
};

type ConfigSection = Record<string, unknown> | undefined;
export type RuntimeConfig = Record<string, ConfigSection>;

function positiveNumber(section: ConfigSection, key: string, fallback: number, integer = false): number {
  const raw = section?.[key];
  if (raw === undefined || raw === null || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    logger.warn(`Ignoring invalid config value ${key}=${String(raw)}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function nonEmptyString(section: ConfigSection, key: string): string | null {
  const raw = section?.[key];
  return typeof raw === 'string' && raw.trim() !== '' ? raw.trim() : null;
}

/**
 * Builds the assistant settings from Firebase runtime config
 * (`firebase functions:config:set assistant.history_window=12`).
 */
export function resolveConfig(runtime: RuntimeConfig): AssistantConfig {
  const assistant = runtime.assistant;
  const gemini = runtime.gemini;

  return {
    anomalyThreshold: positiveNumber(assistant, 'anomaly_threshold', defaultConfig.anomalyThreshold),
    historyWindow: positiveNumber(assistant, 'history_window', defaultConfig.historyWindow, true),
    completionTimeoutMs: positiveNumber(assistant, 'completion_timeout_ms', defaultConfig.completionTimeoutMs, true),
    maxPromptChars: positiveNumber(assistant, 'max_prompt_chars', defaultConfig.maxPromptChars, true),
    geminiModel: nonEmptyString(gemini, 'model') ?? defaultConfig.geminiModel,
    geminiApiKey: nonEmptyString(gemini, 'api_key'),
  };
}

let cached: AssistantConfig | null = null;

export function loadConfig(): AssistantConfig {
  if (!cached) {
    cached = resolveConfig(functions.config());
  }
  return cached;
}
