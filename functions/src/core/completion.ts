import { GoogleGenAI } from "@google/genai";
import * as logger from "firebase-functions/logger";
import { CompletionServiceError, errorMessage } from '../lib/errors';

export interface CompletionService {
  complete(prompt: string): Promise<string>;
}

export function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new CompletionServiceError(`Timeout after ${timeoutMs} ms`, true)),
      timeoutMs
    );
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Wraps any completion backend so that a slow or failed call surfaces as a
 * CompletionServiceError and an empty answer is never returned.
 */
export async function completeWithin(
  service: CompletionService,
  prompt: string,
  timeoutMs: number
): Promise<string> {
  let text: string;
  try {
    text = await withTimeout(service.complete(prompt), timeoutMs);
  } catch (error) {
    if (error instanceof CompletionServiceError) throw error;
    throw new CompletionServiceError(`Completion failed: ${errorMessage(error)}`, false, { cause: error });
  }
  const trimmed = text.trim();
  if (!trimmed) {
    throw new CompletionServiceError('Completion service returned an empty response');
  }
  return trimmed;
}

export class GeminiCompletionService implements CompletionService {
  private readonly ai: GoogleGenAI;

  constructor(apiKey: string, private readonly model: string) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: prompt,
    });
    if (response.usageMetadata) {
      logger.info('Gemini token usage', {
        prompt: response.usageMetadata.promptTokenCount,
        response: response.usageMetadata.candidatesTokenCount,
        total: response.usageMetadata.totalTokenCount,
      });
    }
    return response.text ?? '';
  }
}
