import { IEmbeddingBackend } from '@application/ports/embedding-backend.port';
import { EmbeddingBackendError } from '@domain/errors/scoring.errors';
import { getErrorInfo } from '@common/error-assertions';

/** The part of LangChain's Embeddings this adapter calls. */
export interface EmbeddingModel {
  embedQuery(text: string): Promise<number[]>;
}

export class LangChainEmbeddingAdapter implements IEmbeddingBackend {
  constructor(
    private readonly embeddings: EmbeddingModel,
    readonly modelName: string,
  ) {}

  async embed(text: string): Promise<number[]> {
    try {
      return await this.embeddings.embedQuery(text);
    } catch (error) {
      throw new EmbeddingBackendError(
        `Embedding request to ${this.modelName} failed: ${getErrorInfo(error).message}`,
        { cause: error },
      );
    }
  }
}
