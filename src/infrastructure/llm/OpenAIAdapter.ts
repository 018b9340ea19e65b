/**
 * OpenAI + Mastra integration layer.
 *
 * - Lazily built OpenAI client shared with the embedding provider.
 * - Retry with short back-off for transient failures (429/5xx, resets, timeouts).
 * - Answer generation through a Mastra agent over the retrieved, authorized
 *   documents only.
 */
import { createOpenAI } from "@ai-sdk/openai";
import { config } from "@config/index";
import type { DocumentRecord } from "@domain/documents/document";
import type { AnswerGeneratorPort } from "@domain/llm/ports";
import { buildAnswerPrompt } from "@domain/rag/answerPrompt";
import { logEvent, logger } from "@infrastructure/logging/Logger";
import { InfrastructureError, isAppError } from "@typesLocal/AppError";
import { Agent } from "@mastra/core/agent";
import OpenAI from "openai";

let sharedClient: OpenAI | null = null;
let sharedAgent: Agent | null = null;

export function getOpenAIClient(): OpenAI {
  if (!sharedClient) {
    sharedClient = new OpenAI({
      apiKey: config.openai.key,
      baseURL: config.openai.baseUrl,
      timeout: config.openai.timeoutMs,
    });
  }
  return sharedClient;
}

function getAnswerAgent(): Agent {
  if (!sharedAgent) {
    const provider = createOpenAI({
      apiKey: config.openai.key,
      baseURL: config.openai.baseUrl,
    });

    sharedAgent = new Agent({
      name: "document-answer-agent",
      instructions:
        "Answer strictly from the context documents you are given. Never invent facts. Be concise.",
      model: provider(config.openai.model),
    });
  }
  return sharedAgent;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readProperty(source: unknown, key: string): unknown {
  if (source && typeof source === "object" && key in source) {
    return Reflect.get(source, key);
  }
  return undefined;
}

export function isRetryableError(error: unknown): boolean {
  const retryableCodes = new Set(["ECONNRESET", "ETIMEDOUT"]);
  const retryableStatuses = new Set([429, 500, 502, 503]);

  const code =
    readProperty(error, "code") ?? readProperty(readProperty(error, "cause"), "code");
  if (typeof code === "string" && retryableCodes.has(code)) {
    return true;
  }

  const status =
    readProperty(error, "statusCode") ??
    readProperty(error, "status") ??
    readProperty(readProperty(error, "response"), "status");

  return typeof status === "number" && retryableStatuses.has(status);
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  operation: string,
  backoffDelays: readonly number[] = [0, 200, 500]
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= backoffDelays.length; attempt += 1) {
    if (attempt > 1) {
      await delay(backoffDelays[attempt - 1] ?? 0);
    }

    try {
      return await fn();
    } catch (e: unknown) {
      lastError = e;

      if (!isRetryableError(e) || attempt === backoffDelays.length) {
        throw e;
      }

      logger.log("warn", "LLM_RETRY", {
        attempt,
        error: e instanceof Error ? e.message : String(e),
        operation,
      });
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`${operation} failed after retries.`);
}

export async function generateAnswer(
  question: string,
  documents: readonly DocumentRecord[]
): Promise<string> {
  const prompt = buildAnswerPrompt(question, documents);
  const startedAt = Date.now();

  try {
    const result = await withRetry(
      () => getAnswerAgent().generate(prompt),
      "llm.generate"
    );

    logEvent("LLM_SUCCESS", {
      model: config.openai.model,
      durationMs: Date.now() - startedAt,
      questionLength: question.length,
      documentCount: documents.length,
    });

    return result.text;
  } catch (error: unknown) {
    const caught =
      error instanceof Error
        ? { message: error.message, name: error.name }
        : { message: String(error), name: undefined };

    logEvent("LLM_FAILURE", {
      model: config.openai.model,
      durationMs: Date.now() - startedAt,
      message: caught.message,
      name: caught.name,
    });

    if (isAppError(error)) {
      throw error;
    }
    throw new InfrastructureError(
      "LLM request failed. Check API key or model.",
      502,
      { model: config.openai.model },
      { cause: error }
    );
  }
}

export const answerGenerator: AnswerGeneratorPort = {
  generate: generateAnswer,
};

export async function validateOpenAIKey(): Promise<void> {
  const key = config.openai.key;

  if (!key || key === "mock-key") {
    logger.log("warn", "OPENAI_API_KEY not provided or using mock-key; ingestion and queries will fail");
    return;
  }

  try {
    const startedAt = Date.now();

    const response = await getOpenAIClient().embeddings.create({
      model: config.openai.embeddingModel,
      input: "connectivity-check",
    });

    if (!response.data[0]?.embedding?.length) {
      logger.log("error", "OpenAI connectivity test returned no embedding data");
      return;
    }

    logger.log("info", "OpenAI connectivity OK", {
      model: config.openai.embeddingModel,
      durationMs: Date.now() - startedAt,
      dimensions: response.data[0].embedding.length,
    });
  } catch (error: unknown) {
    logger.log("error", "OpenAI connectivity test failed", {
      message: error instanceof Error ? error.message : String(error),
    });
  }
}
