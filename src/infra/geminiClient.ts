/**
 * Text generator backed by Gemini through the @google/genai SDK.
 */

import { GoogleGenAI } from '@google/genai';
import type { TextGenerator } from '../domain/text-generation.js';

/**
 * The slice of the SDK's `models` namespace the generator calls.
 */
export interface GeminiModels {
  generateContent(params: {
    model: string;
    contents: string;
    config?: { abortSignal?: AbortSignal };
  }): Promise<{ text?: string | undefined }>;
}

export interface GeminiOptions {
  apiKey: string;
  model: string;
  /** Defaults to the SDK client for `apiKey` */
  models?: GeminiModels;
}

export function createGeminiTextGenerator(options: GeminiOptions): TextGenerator {
  const models = options.models ?? new GoogleGenAI({ apiKey: options.apiKey }).models;

  return {
    async generate(prompt: string, signal?: AbortSignal): Promise<string> {
      const response = await models.generateContent({
        model: options.model,
        contents: prompt,
        config: { abortSignal: signal },
      });

      const text = response.text;
      if (text === undefined || text.trim() === '') {
        throw new Error('Gemini reply was empty');
      }
      return text;
    },
  };
}
