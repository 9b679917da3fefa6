import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';
import { LlmConfig } from '@config/llm.config';

export function createChatModel(config: LlmConfig): ChatOpenAI {
  return new ChatOpenAI({
    model: config.chatModel,
    temperature: config.temperature,
    apiKey: config.apiKey,
    maxRetries: config.maxRetries,
    timeout: config.timeoutMs,
    configuration: config.baseUrl ? { baseURL: config.baseUrl } : undefined,
  });
}

export function createEmbeddings(config: LlmConfig): OpenAIEmbeddings {
  return new OpenAIEmbeddings({
    model: config.embeddingModel,
    apiKey: config.apiKey,
    maxRetries: config.maxRetries,
    timeout: config.timeoutMs,
    configuration: config.baseUrl ? { baseURL: config.baseUrl } : undefined,
  });
}
