export interface TokenLogprob {
  token: string;
  logprob: number;
}

/**
 * Black-box model oracle. Embedding, free-form generation and single-token
 * judgement with top-K log-probabilities at position 0.
 */
export interface InferenceClient {
  readonly embeddingModel: string;
  readonly generationModel: string;
  readonly rerankModel: string;
  embed(texts: string[]): Promise<number[][]>;
  generate(prompt: string): Promise<string>;
  topLogprobs(prompt: string, k: number): Promise<TokenLogprob[]>;
  ping(): Promise<{ models: string[] }>;
}
