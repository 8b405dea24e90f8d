import { z } from 'zod';

/**
 * Wire types for the OGC API - Features collections and for the persisted ingestion state.
 * Both arrive as untrusted JSON, so they are described as zod schemas and the
 * TypeScript types are inferred from them.
 */

// =============================================================================
// Upstream feature collections
// =============================================================================

export const featureSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    properties: z.record(z.string(), z.unknown()).nullish(),
    geometry: z
      .object({
        type: z.string().optional(),
        coordinates: z.unknown().optional(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const featureLinkSchema = z
  .object({
    rel: z.string().nullish(),
    href: z.string().nullish(),
  })
  .passthrough();

export const featurePageSchema = z
  .object({
    features: z.array(featureSchema).nullish(),
    links: z.array(featureLinkSchema).nullish(),
  })
  .passthrough();

export type Feature = z.infer<typeof featureSchema>;
export type FeatureLink = z.infer<typeof featureLinkSchema>;
export type FeaturePage = z.infer<typeof featurePageSchema>;
export type FeatureProperties = Record<string, unknown>;

/** Body of a delta artifact; features are forwarded exactly as fetched. */
export interface DeltaDocument {
  type: 'FeatureCollection';
  features: Feature[];
}

// =============================================================================
// Ingestion state
// =============================================================================

// Keys stay snake_case: the document is shared with checkpoints written by earlier producers.
export const runMetadataSchema = z.object({
  features_fetched: z.number(),
  features_new: z.number(),
  features_rejected_quality: z.number().optional(),
  features_rejected_timestamp: z.number().optional(),
  run_duration_seconds: z.number(),
  oldest_observation: z.string().nullable().optional(),
  newest_observation: z.string().nullable().optional(),
});

export const sourceStateSchema = z.object({
  global_last_processed_dt: z.string().optional(),
  per_station: z.record(z.string(), z.string()).optional(),
  last_run_timestamp: z.string().optional(),
  stations_tracked: z.number().optional(),
  run_metadata: runMetadataSchema.optional(),
});

export const ingestionStateSchema = z.record(z.string(), sourceStateSchema);

export type RunMetadata = z.infer<typeof runMetadataSchema>;
export type SourceState = z.infer<typeof sourceStateSchema>;
export type IngestionState = z.infer<typeof ingestionStateSchema>;
