import { z } from "zod";
import { logger } from "../logger";
import { sleep as defaultSleep } from "../concurrency";
import { PermanentOracleError, TransientOracleError, errorMessage } from "../errors";
import type { EnvConfig } from "../config";
import { extractJson } from "./prompt";
import type { AIProviderConfig, CallSettings, Completion } from "./types";

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

const RETRYABLE_STATUSES = new Set([429, 502, 503, 504]);

function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const msg = error.message.toLowerCase();
  return (
    error.name === "AbortError" ||
    error.name === "TimeoutError" ||
    msg.includes("fetch failed") ||
    msg.includes("socket") ||
    msg.includes("econnreset") ||
    msg.includes("connection refused") ||
    msg.includes("econnrefused") ||
    msg.includes("enotfound") ||
    msg.includes("network timeout")
  );
}

export function getGroqProvider(env: EnvConfig): AIProviderConfig {
  return {
    name: "groq",
    endpoint: env.aiEndpoint,
    model: env.groqModel,
    apiKey: env.groqApiKey,
  };
}

async function callProvider(
  provider: AIProviderConfig,
  systemPrompt: string,
  userPrompt: string,
  settings: CallSettings,
  retryCount = 0,
): Promise<Completion> {
  const sleep = settings.sleep ?? defaultSleep;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), settings.timeoutMs);
  const attempts = retryCount + 1;

  let response: Response;
  let body: string;
  try {
    logger.info(
      `AI: calling ${provider.name} (${provider.model})${retryCount > 0 ? ` retry ${retryCount}` : ""}...`,
    );
    response = await fetch(provider.endpoint, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${provider.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: provider.model,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
        max_tokens: settings.maxTokens ?? 2048,
        temperature: settings.temperature ?? 0.3,
      }),
      signal: controller.signal,
    });
    body = await response.text();
  } catch (error) {
    if (!isRetryableError(error)) {
      throw new PermanentOracleError(
        `${provider.name} request failed: ${errorMessage(error)}`,
      );
    }
    if (retryCount < settings.maxRetries) {
      const backoffMs = settings.backoffStartMs * (retryCount + 1);
      logger.warn(
        `AI: ${provider.name} connection error (${errorMessage(error)}), retrying in ${backoffMs}ms...`,
      );
      await sleep(backoffMs);
      return callProvider(provider, systemPrompt, userPrompt, settings, retryCount + 1);
    }
    throw new TransientOracleError(
      `${provider.name} unreachable after ${attempts} attempt(s): ${errorMessage(error)}`,
      attempts,
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    if (RETRYABLE_STATUSES.has(response.status)) {
      if (retryCount < settings.maxRetries) {
        const backoffMs = settings.backoffStartMs * (retryCount + 1);
        logger.warn(
          `AI: ${provider.name} returned ${response.status}, retrying in ${backoffMs}ms...`,
        );
        await sleep(backoffMs);
        return callProvider(provider, systemPrompt, userPrompt, settings, retryCount + 1);
      }
      throw new TransientOracleError(
        `${provider.name} returned ${response.status} after ${attempts} attempt(s)`,
        attempts,
        response.status,
      );
    }

    logger.error(
      `AI: ${provider.name} returned ${response.status}: ${body.substring(0, 200)}`,
    );
    throw new PermanentOracleError(
      `${provider.name} rejected the request with ${response.status}`,
      response.status,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new PermanentOracleError(`${provider.name} returned a non-JSON body`);
  }

  const envelope = chatCompletionSchema.safeParse(json);
  if (!envelope.success) {
    throw new PermanentOracleError(`${provider.name} returned an unexpected response shape`);
  }
  const parsed = envelope.data;

  const content = parsed.choices?.[0]?.message?.content ?? "";
  if (!content.trim()) {
    throw new PermanentOracleError(`${provider.name} returned empty content`);
  }

  const promptTokens = parsed.usage?.prompt_tokens ?? 0;
  const completionTokens = parsed.usage?.completion_tokens ?? 0;
  logger.debug(
    `AI: ${provider.name} used ${promptTokens} prompt + ${completionTokens} completion tokens`,
  );

  return { content, promptTokens, completionTokens };
}

/**
 * Thin chat-completions client for an OpenAI-compatible endpoint.
 * Retryable failures (429, 502-504, network, timeout) are retried with
 * linear backoff and end in TransientOracleError; anything else is a
 * PermanentOracleError.
 */
export class AIClient {
  constructor(
    private readonly provider: AIProviderConfig,
    private readonly settings: CallSettings,
  ) {}

  get model(): string {
    return this.provider.model;
  }

  complete(systemPrompt: string, userPrompt: string): Promise<Completion> {
    if (!this.provider.apiKey) {
      return Promise.reject(
        new PermanentOracleError(`No API key configured for ${this.provider.name}`),
      );
    }
    return callProvider(this.provider, systemPrompt, userPrompt, this.settings);
  }

  async completeJson<S extends z.ZodTypeAny>(
    systemPrompt: string,
    userPrompt: string,
    schema: S,
  ): Promise<z.output<S>> {
    const { content } = await this.complete(systemPrompt, userPrompt);
    const result = schema.safeParse(extractJson(content));

    if (!result.success) {
      logger.debug(`AI: Raw response: ${content.substring(0, 500)}`);
      throw new PermanentOracleError(
        `Unusable ${this.provider.name} response: ${result.error.issues
          .map((i) => `${i.path.join(".") || "(root)"} ${i.message}`)
          .join("; ")}`,
      );
    }
    return result.data;
  }
}

export function createAIClient(env: EnvConfig, settings: CallSettings): AIClient {
  return new AIClient(getGroqProvider(env), settings);
}

export { extractJson, stripHtml, truncateDescription } from "./prompt";
export type { AIProviderConfig, CallSettings, Completion } from "./types";
