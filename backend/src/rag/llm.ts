import axios from "axios";
import { ENV } from "../config/env";
import { APOLOGY_PREFIX } from "../config/constants";
import { buildSystemPrompt, buildUserPrompt } from "./promptBuilder";
import { createMockProvider } from "./mockLlm";
import type { AssembledContext, ConversationExchange, Intent } from "../types";

const GEMINI_API_URL = "https://generativelanguage.googleapis.com/v1beta/models";
const OPENAI_API_URL = "https://api.openai.com/v1/chat/completions";

export type ProviderName = "gemini" | "openai" | "mock";

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  query: string;
  context: AssembledContext;
  timeoutMs: number;
}

/**
 * A hosted (or offline) text-completion backend
 */
export interface LLMProvider {
  name: ProviderName;
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * Ordered backends plus the per-call timeout
 */
export interface ProviderPolicy {
  providers: LLMProvider[];
  timeoutMs: number;
}

export interface GenerateOptions {
  policy?: ProviderPolicy;
  history?: ConversationExchange[];
}

interface GeminiResponse {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
  }>;
}

interface OpenAIResponse {
  choices: Array<{ message: { content: string | null } }>;
}

export function createGeminiProvider(apiKey: string, model: string): LLMProvider {
  return {
    name: "gemini",
    async complete({ systemPrompt, userPrompt, timeoutMs }) {
      const response = await axios.post<GeminiResponse>(
        `${GEMINI_API_URL}/${model}:generateContent`,
        {
          systemInstruction: { parts: [{ text: systemPrompt }] },
          contents: [{ role: "user", parts: [{ text: userPrompt }] }],
          generationConfig: { temperature: 0.1, maxOutputTokens: 1000 },
        },
        {
          params: { key: apiKey },
          headers: { "Content-Type": "application/json" },
          timeout: timeoutMs,
        }
      );

      const parts = response.data.candidates?.[0]?.content?.parts ?? [];
      const answer = parts.map((part) => part.text ?? "").join("").trim();

      if (answer.length === 0) {
        throw new Error("Gemini returned an empty response");
      }
      return answer;
    },
  };
}

export function createOpenAIProvider(apiKey: string, model: string): LLMProvider {
  return {
    name: "openai",
    async complete({ systemPrompt, userPrompt, timeoutMs }) {
      const response = await axios.post<OpenAIResponse>(
        OPENAI_API_URL,
        {
          model,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
          temperature: 0.1, // Keep low so figures are quoted, not paraphrased
          max_tokens: 1000,
        },
        {
          headers: {
            Authorization: `Bearer ${apiKey}`,
            "Content-Type": "application/json",
          },
          timeout: timeoutMs,
        }
      );

      const answer = response.data.choices[0]?.message.content?.trim();

      if (!answer || answer.length === 0) {
        throw new Error("OpenAI returned an empty response");
      }
      return answer;
    },
  };
}

/**
 * Provider chain from configuration. A hosted provider joins the chain only
 * when its key is set; "mock" needs no key.
 */
export function buildProviderPolicy(env: typeof ENV = ENV): ProviderPolicy {
  const providers: LLMProvider[] = [];

  for (const name of env.LLM_PROVIDER_ORDER) {
    switch (name) {
      case "gemini":
        if (env.GOOGLE_API_KEY) {
          providers.push(createGeminiProvider(env.GOOGLE_API_KEY, env.GEMINI_MODEL));
        }
        break;
      case "openai":
        if (env.OPENAI_API_KEY) {
          providers.push(createOpenAIProvider(env.OPENAI_API_KEY, env.OPENAI_MODEL));
        }
        break;
      case "mock":
        providers.push(createMockProvider());
        break;
      default:
        console.warn(`[LLM] Unknown provider "${name}" in LLM_PROVIDER_ORDER`);
    }
  }

  return { providers, timeoutMs: env.LLM_TIMEOUT_MS };
}

function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    return err.response ? `Request failed with status ${err.response.status}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

function logProviderError(name: ProviderName, err: unknown): void {
  console.error(`❌ ${name} LLM Error`);

  if (axios.isAxiosError(err) && err.response) {
    console.error("Status:", err.response.status);
    console.error("Data:", JSON.stringify(err.response.data, null, 2));
  } else {
    console.error("Message:", err instanceof Error ? err.message : String(err));
  }
}

/**
 * Generate the answer text for a question and its assembled card context.
 * Providers are tried in policy order; when all fail the caller still gets
 * a user-facing apology carrying the last error.
 */
export async function generateAnswer(
  query: string,
  context: AssembledContext,
  intent: Intent | null,
  options: GenerateOptions = {}
): Promise<string> {
  const policy = options.policy ?? buildProviderPolicy();

  if (policy.providers.length === 0) {
    return `${APOLOGY_PREFIX} Error: No LLM provider is configured (set GOOGLE_API_KEY or OPENAI_API_KEY).`;
  }

  const request: CompletionRequest = {
    systemPrompt: buildSystemPrompt(intent),
    userPrompt: buildUserPrompt({ query, context, history: options.history }),
    query,
    context,
    timeoutMs: policy.timeoutMs,
  };

  let lastError: unknown = null;

  for (const provider of policy.providers) {
    try {
      const answer = await provider.complete(request);
      console.log(`[LLM] ${provider.name} answered (${answer.length} chars)`);
      return answer;
    } catch (err) {
      logProviderError(provider.name, err);
      lastError = err;
    }
  }

  return `${APOLOGY_PREFIX} Error: ${describeError(lastError)}`;
}
