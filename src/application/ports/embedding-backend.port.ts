/**
 * Embedding Backend Port
 */
export interface IEmbeddingBackend {
  readonly modelName: string;
  embed(text: string): Promise<number[]>;
}

export const EMBEDDING_BACKEND = Symbol('EMBEDDING_BACKEND');
