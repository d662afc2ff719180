// ============================================
// FEATURE BUILDER
// ============================================
// Offline step: embeds every POI text and every theme descriptor and writes
// the vectors into the catalog, so the scorer can blend cosine similarity
// into theme relevance. Never runs during itinerary generation.

import { THEMES } from "@/types";
import type { Theme } from "@/types";
import type { CatalogFile, CatalogPoiRecord } from "./catalog-schema";
import { buildThemeDescriptorText } from "./theme-descriptors";

export type Embedder = (texts: string[]) => Promise<number[][]>;

/**
 * The slice of the OpenAI client the builder needs
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export interface FeatureBuildOptions {
  /** Language whose text is embedded; defaults to the catalog default */
  language?: string;
  batchSize?: number;
  onBatch?: (completed: number, total: number) => void;
}

export const DEFAULT_EMBEDDING_BATCH_SIZE = 64;

/**
 * name + short description + description, falling back to the POI's own
 * name when the language has no entry.
 */
export function buildPoiEmbeddingText(record: CatalogPoiRecord, language: string): string {
  const text = record.texts[language] ?? Object.values(record.texts)[0];
  const parts = [text?.name ?? record.name, text?.shortDescription, text?.description];
  return parts
    .filter((part): part is string => Boolean(part && part.trim()))
    .map((part) => part.trim())
    .join(". ");
}

export async function embedInBatches(
  texts: string[],
  embed: Embedder,
  batchSize: number = DEFAULT_EMBEDDING_BATCH_SIZE,
  onBatch?: (completed: number, total: number) => void
): Promise<number[][]> {
  const vectors: number[][] = [];

  for (let offset = 0; offset < texts.length; offset += batchSize) {
    const batch = texts.slice(offset, offset + batchSize);
    const embedded = await embed(batch);
    if (embedded.length !== batch.length) {
      throw new Error(`Embedder returned ${embedded.length} vectors for ${batch.length} texts`);
    }
    vectors.push(...embedded);
    onBatch?.(Math.min(offset + batchSize, texts.length), texts.length);
  }

  return vectors;
}

/**
 * Returns a new catalog with feature vectors on every POI and a vector per
 * theme. The input catalog is left untouched.
 */
export async function attachFeatureVectors(
  catalog: CatalogFile,
  embed: Embedder,
  options: FeatureBuildOptions = {}
): Promise<CatalogFile> {
  const language = (options.language ?? catalog.defaultLanguage).toLowerCase();
  const batchSize = options.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE;

  const poiTexts = catalog.pois.map((poi) => buildPoiEmbeddingText(poi, language));
  const poiVectors = await embedInBatches(poiTexts, embed, batchSize, options.onBatch);

  const themeVectorList = await embedInBatches(
    THEMES.map((theme) => buildThemeDescriptorText(theme)),
    embed,
    batchSize
  );
  const themeVectors: Partial<Record<Theme, number[]>> = {};
  THEMES.forEach((theme, index) => {
    themeVectors[theme] = themeVectorList[index];
  });

  return {
    ...catalog,
    themeVectors,
    pois: catalog.pois.map((poi, index) => ({ ...poi, featureVector: poiVectors[index] })),
  };
}

/**
 * Embedder backed by the OpenAI embeddings endpoint
 */
export function createOpenAIEmbedder(client: EmbeddingsClient, model: string): Embedder {
  return async (texts: string[]) => {
    const response = await client.embeddings.create({ model, input: texts });
    return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  };
}
