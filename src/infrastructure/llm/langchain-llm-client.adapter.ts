import { HumanMessage } from '@langchain/core/messages';
import type { BaseMessage, MessageContent } from '@langchain/core/messages';
import { ILlmClient } from '@application/ports/llm-client.port';
import { ILoggerPort } from '@application/ports/logger.port';
import { LlmClientError } from '@domain/errors/scoring.errors';
import { getErrorInfo } from '@common/error-assertions';

/** The part of a LangChain chat model this adapter calls. */
export interface ChatModel {
  invoke(messages: BaseMessage[]): Promise<{ content: MessageContent }>;
}

const CODE_FENCE = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/;

export function messageText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = CODE_FENCE.exec(trimmed);
  return match ? match[1] : trimmed;
}

/**
 * Sends the prompt as a single human message and parses the reply as JSON.
 * Transport errors and unparseable replies both raise LlmClientError.
 */
export class LangChainLlmClientAdapter implements ILlmClient {
  constructor(
    private readonly model: ChatModel,
    private readonly logger: ILoggerPort,
  ) {}

  async generate(prompt: string): Promise<unknown> {
    let content: MessageContent;
    try {
      const reply = await this.model.invoke([new HumanMessage(prompt)]);
      content = reply.content;
    } catch (error) {
      const info = getErrorInfo(error);
      this.logger.error(`LLM request failed: ${info.message}`, error, LangChainLlmClientAdapter.name);
      throw new LlmClientError(`LLM request failed: ${info.message}`, { cause: error });
    }

    const text = stripCodeFence(messageText(content));
    try {
      return JSON.parse(text);
    } catch (error) {
      this.logger.warn('LLM reply is not JSON', LangChainLlmClientAdapter.name, {
        preview: text.slice(0, 200),
      });
      throw new LlmClientError(`LLM reply is not valid JSON: ${getErrorInfo(error).message}`, {
        cause: error,
      });
    }
  }
}
