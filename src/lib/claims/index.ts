import { z } from 'zod';
import { ClaimDecodeError } from '../errors';
import { EBS_PROVISIONER, PROVISIONER_ANNOTATION, StorageClaim } from '../../types/claim';

const claimSchema = z.object({
  kind: z.literal('PersistentVolumeClaim').optional(),
  metadata: z.object({
    name: z.string().min(1, 'metadata.name is required'),
    namespace: z.string().min(1, 'metadata.namespace is required'),
    annotations: z.record(z.string()).nullish(),
  }),
  spec: z
    .object({
      volumeName: z.string().nullish(),
    })
    .nullish(),
});

/**
 * Validate a raw watch object and reduce it to the fields the tagger reads.
 */
export function decodeClaim(object: unknown): StorageClaim {
  const parsed = claimSchema.safeParse(object);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ClaimDecodeError('unexpected claim payload', issues);
  }

  const { metadata, spec } = parsed.data;
  return {
    namespace: metadata.namespace,
    name: metadata.name,
    annotations: metadata.annotations ?? {},
    volumeName: spec?.volumeName || undefined,
  };
}

/** True iff the claim was provisioned by the in-tree EBS provisioner. */
export function isEbsClaim(claim: StorageClaim): boolean {
  return claim.annotations[PROVISIONER_ANNOTATION] === EBS_PROVISIONER;
}
