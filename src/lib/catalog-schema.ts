// ============================================
// CATALOG FILE SCHEMA
// ============================================
// Shape of data/catalog/pois.json. Validated once when the catalog loads and
// again before the feature builder writes vectors back.

import { z } from "zod";
import { THEMES } from "@/types";

const languageCode = z
  .string()
  .trim()
  .min(2)
  .max(10)
  .transform((value) => value.toLowerCase());

export const poiTextSchema = z.object({
  name: z.string().trim().min(1).optional(),
  shortDescription: z.string().optional(),
  description: z.string().default(""),
});

export const catalogPoiSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  type: z.string().default("other"),
  city: z.string().trim().min(1),
  country: z.string().trim().min(1),
  rating: z.number().min(0).max(5).optional(),
  texts: z.record(languageCode, poiTextSchema).default({}),
  featureVector: z.array(z.number()).min(1).optional(),
});

export const catalogFileSchema = z
  .object({
    version: z.string().min(1),
    defaultLanguage: languageCode.default("en"),
    themeVectors: z.record(z.enum(THEMES), z.array(z.number()).min(1)).optional(),
    pois: z.array(catalogPoiSchema),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.pois.forEach((poi, index) => {
      if (seen.has(poi.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["pois", index, "id"],
          message: `Duplicate POI id "${poi.id}"`,
        });
      }
      seen.add(poi.id);
    });
  });

export type CatalogPoiRecord = z.infer<typeof catalogPoiSchema>;
export type CatalogFile = z.infer<typeof catalogFileSchema>;

/**
 * Flattens zod issues into "path: message" lines for logs and errors.
 */
export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}
