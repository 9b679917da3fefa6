/**
 * LLM Client Port
 *
 * One prompt in, one structured reply out. The reply stays `unknown` until
 * the caller has validated it.
 */
export interface ILlmClient {
  generate(prompt: string): Promise<unknown>;
}

export const LLM_CLIENT = Symbol('LLM_CLIENT');
