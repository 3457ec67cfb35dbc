import { z } from 'zod';

/**
 * Subsets of the Kubernetes / OpenShift REST payloads the monitor tests read.
 * Unknown fields are dropped.
 */

const ListMetaSchema = z
  .object({
    continue: z.string().optional(),
  })
  .optional();

const OwnerReferenceSchema = z.object({
  kind: z.string(),
  name: z.string(),
});

const ObjectMetaSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().optional(),
  annotations: z.record(z.string()).optional(),
  ownerReferences: z.array(OwnerReferenceSchema).optional(),
});

export const NamespaceListSchema = z.object({
  metadata: ListMetaSchema,
  items: z.array(z.object({ metadata: ObjectMetaSchema })),
});

export const PodListSchema = z.object({
  metadata: ListMetaSchema,
  items: z.array(z.object({ metadata: ObjectMetaSchema })),
});

export const InfrastructureSchema = z.object({
  status: z.object({
    controlPlaneTopology: z.string().optional(),
    platform: z.string().optional(),
    platformStatus: z.object({ type: z.string() }).optional(),
  }),
});

export const ClusterVersionSchema = z.object({
  status: z.object({
    desired: z.object({ version: z.string() }).optional(),
    history: z.array(z.object({ version: z.string() })).optional(),
  }),
});

export type NamespaceList = z.infer<typeof NamespaceListSchema>;
export type PodList = z.infer<typeof PodListSchema>;
export type Infrastructure = z.infer<typeof InfrastructureSchema>;
export type ClusterVersion = z.infer<typeof ClusterVersionSchema>;
