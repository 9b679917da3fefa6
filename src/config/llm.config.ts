import { registerAs } from '@nestjs/config';

export interface LlmConfig {
  apiKey?: string;
  /** OpenAI-compatible endpoint, e.g. an OpenRouter gateway */
  baseUrl?: string;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  maxRetries: number;
  timeoutMs: number;
}

export const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function loadLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig {
  return {
    apiKey: env.LLM_API_KEY || env.OPENAI_API_KEY || undefined,
    baseUrl: env.LLM_BASE_URL || undefined,
    chatModel: env.LLM_CHAT_MODEL || DEFAULT_CHAT_MODEL,
    embeddingModel: env.LLM_EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
    temperature: numberFromEnv(env.LLM_TEMPERATURE, 0),
    maxRetries: parseInt(env.LLM_MAX_RETRIES || '3', 10),
    timeoutMs: parseInt(env.LLM_TIMEOUT_MS || '30000', 10),
  };
}

export default registerAs('llm', (): LlmConfig => loadLlmConfig());
