/**
 * Shapes of the JSON documents the registry returns. Unknown fields are
 * dropped.
 */

import { z } from 'zod';
import type { OciDescriptor, OciImageIndex, OciManifest } from './types.js';

const annotations = z.record(z.string());

export const ociDescriptorSchema: z.ZodType<OciDescriptor> = z.object({
  mediaType: z.string(),
  digest: z.string().min(1),
  size: z.number().int().nonnegative(),
  annotations: annotations.optional(),
  artifactType: z.string().optional(),
});

export const ociManifestSchema: z.ZodType<OciManifest> = z.object({
  schemaVersion: z.number().int(),
  mediaType: z.string().optional(),
  artifactType: z.string().optional(),
  config: ociDescriptorSchema.optional(),
  layers: z.array(ociDescriptorSchema),
  annotations: annotations.optional(),
});

export const ociImageIndexSchema: z.ZodType<OciImageIndex> = z.object({
  schemaVersion: z.number().int(),
  mediaType: z.string().optional(),
  manifests: z.array(ociDescriptorSchema),
  annotations: annotations.optional(),
});

export const quayTagPageSchema = z.object({
  tags: z.array(
    z.object({
      name: z.string().min(1),
      manifest_digest: z.string().min(1),
      start_ts: z.number().optional(),
    })
  ),
  page: z.number().int(),
  has_additional: z.boolean(),
});

export type QuayTagPage = z.infer<typeof quayTagPageSchema>;
export type QuayTag = QuayTagPage['tags'][number];

/**
 * First issue of a failed parse as `path: message`.
 */
export function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return 'invalid document';
  }
  return `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`;
}
