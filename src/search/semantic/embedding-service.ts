/**
 * Embedding service for generating query and document embeddings using Ollama
 */

import { z } from 'zod';
import { DEFAULT_EMBEDDING_SETTINGS } from '../../settings';
import type { EmbeddingServiceSettings } from '../../settings';
import { logger } from '../../utils/logger';
import { sleep, withTimeout } from '../../utils/timeout';
import { describeError, EmbeddingError } from '../errors';
import { RequestQueue } from './request-queue';
import type { EmbeddingProvider, EmbeddingTaskType } from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const embeddingResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

export class OllamaEmbeddingService implements EmbeddingProvider {
  private settings: EmbeddingServiceSettings;
  private requestQueue: RequestQueue;
  private fetchImpl: FetchLike;

  constructor(settings: Partial<EmbeddingServiceSettings> = {}, fetchImpl: FetchLike = fetch) {
    this.settings = { ...DEFAULT_EMBEDDING_SETTINGS, ...settings };
    this.requestQueue = new RequestQueue(this.settings.maxConcurrentRequests);
    this.fetchImpl = fetchImpl;

    logger.debug(`EmbeddingService: Initialized for ${this.settings.baseUrl} (model: ${this.settings.model})`);
  }

  async embed(
    text: string,
    taskType: EmbeddingTaskType = 'search_document',
    signal?: AbortSignal
  ): Promise<Float32Array> {
    const retries = this.settings.maxRetries;

    return this.requestQueue.add(async () => {
      let lastError: unknown = null;

      for (let attempt = 1; attempt <= retries; attempt++) {
        if (signal?.aborted) {
          throw new EmbeddingError('Embedding request aborted');
        }

        try {
          return await withTimeout(
            (requestSignal) => this.requestEmbedding(text, taskType, requestSignal),
            this.settings.requestTimeoutMs,
            signal
          );
        } catch (error) {
          lastError = error;
          logger.warn(`EmbeddingService: Embedding attempt ${attempt} failed:`, describeError(error));

          if (attempt < retries && !signal?.aborted) {
            // Exponential backoff
            await sleep(this.settings.retryBaseDelayMs * Math.pow(2, attempt - 1));
          }
        }
      }

      throw new EmbeddingError(`Failed after ${retries} attempts: ${describeError(lastError)}`, { cause: lastError });
    });
  }

  /**
   * Check that the server is reachable and has the configured model pulled
   */
  async checkConnection(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.settings.baseUrl}/api/tags`, { method: 'GET' });
      if (!response.ok) {
        return false;
      }

      const parsed = tagsResponseSchema.safeParse(await response.json());
      return parsed.success && parsed.data.models.some(model => model.name.includes(this.settings.model));
    } catch (error) {
      logger.debug('EmbeddingService: Connection check failed', describeError(error));
      return false;
    }
  }

  getPendingRequests(): number {
    return this.requestQueue.getQueueSize() + this.requestQueue.getActiveRequests();
  }

  private async requestEmbedding(
    text: string,
    taskType: EmbeddingTaskType,
    signal: AbortSignal
  ): Promise<Float32Array> {
    const response = await this.fetchImpl(`${this.settings.baseUrl}/api/embeddings`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.settings.model,
        prompt: `${taskType}: ${text}`,
      }),
      signal,
    });

    if (response.status !== 200) {
      throw new Error(`HTTP ${response.status}: ${await response.text()}`);
    }

    const parsed = embeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Malformed embedding response: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }

    return new Float32Array(parsed.data.embedding);
  }
}
