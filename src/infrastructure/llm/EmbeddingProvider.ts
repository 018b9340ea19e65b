/**
 * OpenAI-backed embedding provider.
 *
 * Turns document content and query text into vectors. Every vector it returns
 * comes from the same configured model, which keeps the store's
 * dimensionality stable.
 */
import { config } from "@config/index";
import type { EmbeddingPort } from "@domain/llm/ports";
import { getOpenAIClient, withRetry } from "@infrastructure/llm/OpenAIAdapter";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  InfrastructureError,
  ValidationError,
  isAppError,
} from "@typesLocal/AppError";

export async function embedText(text: string): Promise<number[]> {
  const normalized = text?.trim() ?? "";

  if (!normalized) {
    throw new ValidationError("Cannot embed empty text");
  }

  const startedAt = Date.now();

  try {
    const response = await withRetry(
      () =>
        getOpenAIClient().embeddings.create({
          model: config.openai.embeddingModel,
          input: normalized,
        }),
      "embeddings.create"
    );

    const first = response.data[0];

    if (!first || !first.embedding || first.embedding.length === 0) {
      throw new InfrastructureError("Embedding API returned invalid data", 502);
    }

    logEvent("EMBEDDING_SUCCESS", {
      model: config.openai.embeddingModel,
      durationMs: Date.now() - startedAt,
      inputLength: normalized.length,
      vectorLength: first.embedding.length,
    });

    return first.embedding;
  } catch (error: unknown) {
    const caught =
      error instanceof Error
        ? { message: error.message, name: error.name }
        : { message: String(error), name: undefined };

    logEvent("EMBEDDING_FAILURE", {
      model: config.openai.embeddingModel,
      durationMs: Date.now() - startedAt,
      message: caught.message,
      name: caught.name,
    });

    if (isAppError(error)) {
      throw error;
    }
    throw new InfrastructureError(
      "Embedding request failed",
      502,
      { model: config.openai.embeddingModel },
      { cause: error }
    );
  }
}

export const openAIEmbeddingProvider: EmbeddingPort = {
  embed: embedText,
};
