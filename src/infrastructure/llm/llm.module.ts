import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EMBEDDING_BACKEND } from '@application/ports/embedding-backend.port';
import { LLM_CLIENT } from '@application/ports/llm-client.port';
import { ILoggerPort } from '@application/ports/logger.port';
import { LlmConfig, loadLlmConfig } from '@config/llm.config';
import { LangChainEmbeddingAdapter } from './langchain-embedding.adapter';
import { LangChainLlmClientAdapter } from './langchain-llm-client.adapter';
import { createChatModel, createEmbeddings } from './langchain.factory';

const llmConfigFrom = (config: ConfigService): LlmConfig =>
  config.get<LlmConfig>('llm') ?? loadLlmConfig();

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: LLM_CLIENT,
      useFactory: (config: ConfigService, logger: ILoggerPort) => {
        const llm = llmConfigFrom(config);
        logger.info(`Using chat model ${llm.chatModel}`, 'LlmModule', {
          baseUrl: llm.baseUrl ?? 'default',
        });
        return new LangChainLlmClientAdapter(createChatModel(llm), logger);
      },
      inject: [ConfigService, 'ILoggerPort'],
    },
    {
      provide: EMBEDDING_BACKEND,
      useFactory: (config: ConfigService) => {
        const llm = llmConfigFrom(config);
        return new LangChainEmbeddingAdapter(createEmbeddings(llm), llm.embeddingModel);
      },
      inject: [ConfigService],
    },
  ],
  exports: [LLM_CLIENT, EMBEDDING_BACKEND],
})
export class LlmModule {}
