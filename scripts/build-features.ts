#!/usr/bin/env node

/**
 * Catalog feature builder
 *
 * Embeds POI texts and theme descriptors with the OpenAI embeddings API and
 * writes the vectors back into the catalog JSON.
 *
 * Usage:
 *   npx tsx scripts/build-features.ts [options]
 *
 * Options:
 *   --catalog <path>    Catalog to read (default: CATALOG_PATH or data/catalog/pois.json)
 *   --out <path>        Where to write the result (default: overwrite the input)
 *   --language <code>   Language to embed (default: the catalog's default language)
 *   --batch <number>    Texts per API call (default: 64)
 */

import "dotenv/config";
import { promises as fs } from "fs";
import path from "path";
import OpenAI from "openai";
import { catalogFileSchema, formatSchemaIssues } from "../src/lib/catalog-schema";
import { readCatalogFile } from "../src/lib/catalog-store";
import { getItineraryConfig } from "../src/lib/config";
import {
  attachFeatureVectors,
  createOpenAIEmbedder,
  DEFAULT_EMBEDDING_BATCH_SIZE,
} from "../src/lib/feature-builder";

function readOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index !== -1 ? args[index + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const config = getItineraryConfig();

  const catalogPath = path.resolve(readOption(args, "--catalog") ?? config.catalogPath);
  const outPath = path.resolve(readOption(args, "--out") ?? catalogPath);
  const language = readOption(args, "--language");
  const batchSize = Number(readOption(args, "--batch") ?? DEFAULT_EMBEDDING_BATCH_SIZE);

  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`--batch must be a positive integer`);
  }
  if (!process.env.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY is not set");
  }

  console.log(`[Features] Reading ${catalogPath}`);
  const catalog = await readCatalogFile(catalogPath);

  const client = new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
  const startTime = Date.now();
  const enriched = await attachFeatureVectors(catalog, createOpenAIEmbedder(client, config.embeddingModel), {
    language,
    batchSize,
    onBatch: (completed, total) => console.log(`[Features] Embedded ${completed}/${total} POIs`),
  });

  const check = catalogFileSchema.safeParse(enriched);
  if (!check.success) {
    throw new Error(`Enriched catalog is invalid:\n${formatSchemaIssues(check.error).join("\n")}`);
  }

  await fs.writeFile(outPath, `${JSON.stringify(enriched, null, 2)}\n`, "utf-8");
  console.log(
    `[Features] Wrote ${enriched.pois.length} POI vectors with ${config.embeddingModel} to ${outPath} ` +
      `in ${Date.now() - startTime}ms`
  );
}

main().catch((error: unknown) => {
  console.error("[Features] Failed:", error);
  process.exit(1);
});
