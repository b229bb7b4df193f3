import { z } from 'zod';

export const ownerReferenceSchema = z.object({
  apiVersion: z.string(),
  kind: z.string(),
  name: z.string(),
  uid: z.string(),
  controller: z.boolean().optional(),
  blockOwnerDeletion: z.boolean().optional(),
});

export const objectMetaSchema = z.object({
  name: z.string().optional(),
  generateName: z.string().optional(),
  namespace: z.string().optional(),
  uid: z.string().optional(),
  resourceVersion: z.string().optional(),
  generation: z.number().int().optional(),
  creationTimestamp: z.string().optional(),
  deletionTimestamp: z.string().optional(),
  labels: z.record(z.string(), z.string()).optional(),
  annotations: z.record(z.string(), z.string()).optional(),
  finalizers: z.array(z.string()).optional(),
  ownerReferences: z.array(ownerReferenceSchema).optional(),
});

export type ObjectMeta = z.infer<typeof objectMetaSchema>;
export type OwnerReference = z.infer<typeof ownerReferenceSchema>;

/**
 * Builds the schema of a typed object: the common envelope (`apiVersion`,
 * `kind`, `metadata`) plus the kind-specific fields in `shape`.
 *
 * Wire fields that are not declared are stripped on decode.
 */
export function typedObjectSchema<Shape extends z.ZodRawShape>(shape: Shape) {
  return z
    .object({
      apiVersion: z.string().optional(),
      kind: z.string().optional(),
      metadata: objectMetaSchema.optional(),
    })
    .extend(shape);
}

export const listMetaSchema = z.object({
  resourceVersion: z.string().optional(),
  continue: z.string().optional(),
  remainingItemCount: z.number().int().optional(),
});

export const statusCauseSchema = z.object({
  field: z.string().optional(),
  message: z.string().optional(),
  reason: z.string().optional(),
});

export const statusSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  code: z.number().int().optional(),
  status: z.string().optional(),
  reason: z.string().optional(),
  message: z.string().optional(),
  details: z
    .object({
      name: z.string().optional(),
      group: z.string().optional(),
      kind: z.string().optional(),
      uid: z.string().optional(),
      retryAfterSeconds: z.number().int().optional(),
      causes: z.array(statusCauseSchema).optional(),
    })
    .optional(),
});

export type Status = z.infer<typeof statusSchema>;

export const apiResourceSchema = z.object({
  name: z.string(),
  singularName: z.string().optional(),
  namespaced: z.boolean(),
  group: z.string().optional(),
  version: z.string().optional(),
  kind: z.string(),
  verbs: z.array(z.string()).default([]),
  shortNames: z.array(z.string()).optional(),
  categories: z.array(z.string()).optional(),
});

export const apiResourceListSchema = z.object({
  kind: z.string().optional(),
  groupVersion: z.string(),
  resources: z.array(apiResourceSchema),
});

export type ApiResource = z.infer<typeof apiResourceSchema>;
export type ApiResourceList = z.infer<typeof apiResourceListSchema>;
