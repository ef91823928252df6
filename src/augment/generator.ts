import { GoogleGenerativeAI } from "@google/generative-ai";
import type { GenerativeModel } from "@google/generative-ai";
import type { AugmentConfig } from "../config.js";
import { requireApiKey } from "../config.js";

/**
 * The external content-generation service: a prompt in, raw text out.
 * Implementations throw on any failure; the orchestrator decides what a
 * failure means for the batch.
 */
export interface ContentGenerator {
  generate(prompt: string): Promise<string>;
}

export class GeminiGenerator implements ContentGenerator {
  private model: GenerativeModel;

  constructor(apiKey: string, modelName: string, timeoutMs?: number) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({ model: modelName }, { timeout: timeoutMs });
  }

  async generate(prompt: string): Promise<string> {
    const result = await this.model.generateContent(prompt);
    return result.response.text();
  }
}

/** Throws MissingCredentialsError when no API key is configured. */
export function createGeminiGenerator(config: AugmentConfig): ContentGenerator {
  return new GeminiGenerator(requireApiKey(config), config.model, config.timeoutMs);
}
