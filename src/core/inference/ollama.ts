import { z, type ZodType } from 'zod';
import { InferenceError, isTransientError } from '../errors';
import { createLogger, errorMessage, type Logger } from '../log';
import type { InferenceConfig } from '../config';
import { withRetry } from './retry';
import type { InferenceClient, TokenLogprob } from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface OllamaClientOptions extends InferenceConfig {
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
}

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const GenerateResponseSchema = z.object({
  response: z.string(),
});

const TokenLogprobSchema = z.object({
  token: z.string(),
  logprob: z.number(),
});

const ChatLogprobResponseSchema = z.object({
  logprobs: z
    .array(
      TokenLogprobSchema.extend({
        top_logprobs: z.array(TokenLogprobSchema).default([]),
      })
    )
    .min(1),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Client for an Ollama-compatible HTTP server (/api/embed, /api/generate,
 * /api/chat with logprobs). Every call has a timeout and is retried on
 * transient failures; anything left over surfaces as InferenceError.
 */
export class OllamaClient implements InferenceClient {
  readonly embeddingModel: string;
  readonly generationModel: string;
  readonly rerankModel: string;
  private options: OllamaClientOptions;
  private fetchImpl: FetchLike;
  private log: Logger;

  constructor(options: OllamaClientOptions) {
    this.options = options;
    this.embeddingModel = options.embeddingModel;
    this.generationModel = options.generationModel;
    this.rerankModel = options.rerankModel;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.log = options.log ?? createLogger({ component: 'inference', backend: 'ollama' });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const res = await this.request('/api/embed', { model: this.embeddingModel, input: texts }, EmbedResponseSchema);
    if (res.embeddings.length !== texts.length) {
      throw new InferenceError(`Embedding count mismatch: sent ${texts.length}, got ${res.embeddings.length}`, { transient: false });
    }
    return res.embeddings;
  }

  async generate(prompt: string): Promise<string> {
    const res = await this.request(
      '/api/generate',
      { model: this.generationModel, prompt, stream: false },
      GenerateResponseSchema
    );
    return res.response.trim();
  }

  async topLogprobs(prompt: string, k: number): Promise<TokenLogprob[]> {
    const res = await this.request(
      '/api/chat',
      {
        model: this.rerankModel,
        messages: [{ role: 'user', content: prompt }],
        stream: false,
        logprobs: true,
        top_logprobs: k,
        options: { temperature: 0.0, num_predict: 1 },
      },
      ChatLogprobResponseSchema
    );
    const first = res.logprobs[0];
    if (!first) return [];
    return first.top_logprobs.map((t) => ({ token: t.token, logprob: t.logprob }));
  }

  async ping(): Promise<{ models: string[] }> {
    const res = await this.request('/api/tags', undefined, TagsResponseSchema, 1);
    const models = res.models.map((m) => m.name);
    for (const wanted of new Set([this.embeddingModel, this.generationModel, this.rerankModel])) {
      const present = models.some((m) => m === wanted || m === `${wanted}:latest`);
      if (!present) this.log.warn('model_not_listed', { model: wanted, available: models.length });
    }
    return { models };
  }

  private async request<T>(pathname: string, body: unknown, schema: ZodType<T, z.ZodTypeDef, unknown>, attempts?: number): Promise<T> {
    const url = `${this.options.baseUrl}${pathname}`;
    return withRetry(
      async () => {
        let res: Response;
        try {
          res = await this.fetchImpl(url, {
            method: body === undefined ? 'GET' : 'POST',
            headers: body === undefined ? undefined : { 'content-type': 'application/json' },
            body: body === undefined ? undefined : JSON.stringify(body),
            signal: AbortSignal.timeout(this.options.timeoutMs),
          });
        } catch (e) {
          throw new InferenceError(`${pathname} request failed: ${errorMessage(e)}`, { transient: isTransientError(e), cause: e });
        }
        if (!res.ok) {
          const detail = await res.text().catch(() => '');
          throw new InferenceError(`${pathname} returned HTTP ${res.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`, {
            transient: res.status >= 500 || res.status === 429,
            status: res.status,
          });
        }
        let json: unknown;
        try {
          json = await res.json();
        } catch (e) {
          throw new InferenceError(`${pathname} returned a non-JSON body`, { transient: false, cause: e });
        }
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
          throw new InferenceError(`${pathname} returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
            transient: false,
          });
        }
        return parsed.data;
      },
      {
        label: pathname,
        attempts: attempts ?? this.options.retries,
        backoffMs: this.options.backoffMs,
        log: this.log,
        sleep: this.options.sleep,
      }
    );
  }
}
