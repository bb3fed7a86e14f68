import type { EmbeddingModel, LMStudioClient } from '@lmstudio/sdk';
import { getClient } from './clientPool.js';

export interface Embedder {
  readonly modelId: string;
  embed(text: string): Promise<number[]>;
}

/** Embeds through a pooled LM Studio client, one text per call. */
export class LmStudioEmbedder implements Embedder {
  private model: Promise<EmbeddingModel> | null = null;

  constructor(
    readonly modelId: string,
    private readonly baseUrl: string,
    private readonly resolveClient: (
      baseUrl: string,
    ) => LMStudioClient = getClient,
  ) {}

  async embed(text: string): Promise<number[]> {
    const model = await this.loadModel();
    const { embedding } = await model.embed(text);
    return embedding;
  }

  private loadModel(): Promise<EmbeddingModel> {
    if (!this.model) {
      const client = this.resolveClient(this.baseUrl);
      this.model = client.embedding.model(this.modelId).catch((err) => {
        // Forget the failed lookup so the next attempt asks LM Studio again.
        this.model = null;
        throw err;
      });
    }
    return this.model;
  }
}
