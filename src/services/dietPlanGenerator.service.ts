import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
} from "@google/generative-ai";
import { UpstreamError } from "../utils/errors";
import { logger } from "../utils/logger";

/** Opaque text service: prompt in, plan text out. */
export interface TextGenerationService {
  generate(prompt: string): Promise<string>;
}

/** The part of a Gemini model this service calls. */
export interface GenerativeModelLike {
  generateContent(prompt: string): Promise<{ response: { text(): string } }>;
}

export interface DietPlanGeneratorOptions {
  apiKey: string;
  model: string;
  temperature?: number;
  generativeModel?: GenerativeModelLike;
}

const TRANSIENT_STATUSES = [429, 500, 503];

const isTransient = (error: unknown): boolean => {
  if (error instanceof GoogleGenerativeAIFetchError) {
    return error.status === undefined || TRANSIENT_STATUSES.includes(error.status);
  }
  // fetch rejects with a TypeError on network failure
  return error instanceof TypeError;
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Gemini-backed meal plan generation, with one retry on a transient failure
 */
export class DietPlanGeneratorService implements TextGenerationService {
  private readonly model: GenerativeModelLike;

  constructor({ apiKey, model, temperature, generativeModel }: DietPlanGeneratorOptions) {
    this.model =
      generativeModel ??
      new GoogleGenerativeAI(apiKey).getGenerativeModel({
        model,
        generationConfig: { temperature },
      });
  }

  async generate(prompt: string): Promise<string> {
    try {
      return await this.generateOnce(prompt);
    } catch (error) {
      if (error instanceof UpstreamError || !isTransient(error)) {
        throw this.toUpstreamError(error);
      }
      logger.warn(`Gemini call failed, retrying once: ${errorMessage(error)}`);
    }

    try {
      return await this.generateOnce(prompt);
    } catch (error) {
      throw this.toUpstreamError(error);
    }
  }

  private async generateOnce(prompt: string): Promise<string> {
    const result = await this.model.generateContent(prompt);
    const text = result.response.text().trim();
    if (!text) {
      throw new UpstreamError("gemini", "Gemini returned an empty response");
    }
    return text;
  }

  private toUpstreamError(error: unknown): UpstreamError {
    if (error instanceof UpstreamError) return error;
    return new UpstreamError("gemini", `Gemini request failed: ${errorMessage(error)}`);
  }
}
