/**
 * Provider-shaped request bodies.
 *
 * Each provider family expects the prompt in a different envelope; the
 * provider entry's own temperature and maxTokens win over the request's.
 */

import { validateDispatchRequest } from "./config.js";
import type {
  ChatMessage,
  DispatchRequest,
  PreparedRequest,
  ProviderSpec,
  RequestFormat,
  ResolvedDispatchRequest,
} from "./types.js";

export const DEFAULT_MAX_TOKENS = 2048;
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_TIMEOUT_MS = 30_000;

const FORMAT_BY_PROVIDER: Readonly<Record<string, RequestFormat>> = {
  openai: "chat",
  azure_openai: "chat",
  grok: "chat",
  anthropic: "anthropic",
  gemini: "gemini",
};

/**
 * Validate and apply request defaults. The excluded set is copied so later
 * additions never reach the caller's object.
 *
 * @throws ValidationError (DISPATCH_INVALID_REQUEST) for out-of-range parameters
 */
export function resolveRequest(request: DispatchRequest): ResolvedDispatchRequest {
  validateDispatchRequest(request);
  return {
    callerId: request.callerId,
    prompt: request.prompt,
    maxTokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
    temperature: request.temperature ?? DEFAULT_TEMPERATURE,
    systemMessage: request.systemMessage,
    context: request.context ?? {},
    timeoutMs: request.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    retryCount: request.retryCount ?? 0,
    preferredProviders: request.preferredProviders ?? [],
    excludedProviders: new Set(request.excludedProviders ?? []),
  };
}

export function requestFormatFor(provider: string): RequestFormat {
  return FORMAT_BY_PROVIDER[provider] ?? "generic";
}

export function prepareRequest(
  request: ResolvedDispatchRequest,
  spec: ProviderSpec,
): PreparedRequest {
  const maxTokens = spec.maxTokens ?? request.maxTokens;
  const temperature = spec.temperature ?? request.temperature;
  const user: ChatMessage = { role: "user", content: request.prompt };

  switch (requestFormatFor(spec.provider)) {
    case "chat": {
      const messages: ChatMessage[] = [];
      if (request.systemMessage) {
        messages.push({ role: "system", content: request.systemMessage });
      }
      messages.push(user);
      return {
        format: "chat",
        body: { model: spec.model, messages, max_tokens: maxTokens, temperature },
      };
    }
    case "anthropic":
      return {
        format: "anthropic",
        body: {
          model: spec.model,
          messages: [user],
          ...(request.systemMessage ? { system: request.systemMessage } : {}),
          max_tokens: maxTokens,
          temperature,
        },
      };
    case "gemini":
      return {
        format: "gemini",
        body: {
          model: spec.model,
          contents: [{ parts: [{ text: request.prompt }] }],
          generationConfig: { maxOutputTokens: maxTokens, temperature },
        },
      };
    case "generic":
      return {
        format: "generic",
        body: { model: spec.model, prompt: request.prompt, max_tokens: maxTokens, temperature },
      };
  }
}
