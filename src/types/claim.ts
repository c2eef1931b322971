export const PROVISIONER_ANNOTATION = 'volume.beta.kubernetes.io/storage-provisioner';
export const EBS_PROVISIONER = 'kubernetes.io/aws-ebs';
export const TAGS_ANNOTATION = 'volume.beta.kubernetes.io/additional-resource-tags';
export const TAGS_SEPARATOR_ANNOTATION = 'volume.beta.kubernetes.io/additional-resource-tags-separator';
export const DEFAULT_TAG_SEPARATOR = ',';

/** Watch phases reported by the API server; anything else is passed through as-is. */
export type ClaimEventType = 'ADDED' | 'MODIFIED' | 'DELETED' | 'BOOKMARK' | 'ERROR';

export type ClaimEvent = {
  type: ClaimEventType | (string & {});
  object: unknown;
};

export type StorageClaim = {
  namespace: string;
  name: string;
  annotations: Record<string, string>;
  volumeName?: string;
};

export type VolumeTag = {
  key: string;
  value: string;
};

/** Correlation fields bound into every log entry for one claim. */
export type ClaimContext = {
  namespace: string;
  volumeClaimName: string;
  volumeName?: string;
};

export type TagSpec = {
  separator: string;
  raw: string;
};

export type ParsedTagSpec = {
  tags: VolumeTag[];
  malformed: string[];
};
