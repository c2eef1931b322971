import type { VolumeTag } from './claim';

export type VolumeRef = {
  region: string;
  volumeId: string;
};

/** Resolves a bound PersistentVolume name to its provider volume URL. */
export interface ClaimVolumeResolver {
  resolveVolumeUrl(volumeName: string): Promise<string>;
}

export interface VolumeTagStore {
  getVolumeTags(ref: VolumeRef): Promise<VolumeTag[]>;
  createVolumeTag(ref: VolumeRef, tag: VolumeTag): Promise<void>;
}

export type TagReconcileResult = VolumeRef & {
  applied: VolumeTag[];
  existing: VolumeTag[];
  failed: VolumeTag[];
  /** Tags that would have been created outside dry-run mode. */
  skipped: VolumeTag[];
};
