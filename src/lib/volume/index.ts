import { VolumeIdParseError } from '../errors';
import type { VolumeRef } from '../../types/volume';

const ZONE_SUFFIX = /[a-z]$/;

/**
 * Decompose a provider volume URL such as `aws://eu-west-1b/vol-0123`
 * into the region (zone minus its trailing letter) and the bare volume id.
 */
export function splitVolumeId(volumeUrl: string): VolumeRef {
  const segments = volumeUrl.split('/');
  if (segments.length !== 4) {
    throw new VolumeIdParseError(volumeUrl, `expected 4 '/'-separated segments, got ${segments.length}`);
  }

  const [scheme, empty, zone, volumeId] = segments;
  if (!scheme.endsWith(':') || scheme.length < 2 || empty !== '') {
    throw new VolumeIdParseError(volumeUrl, "expected a 'scheme://' prefix");
  }
  if (!zone) {
    throw new VolumeIdParseError(volumeUrl, 'missing availability zone');
  }
  if (!volumeId) {
    throw new VolumeIdParseError(volumeUrl, 'missing volume id');
  }

  return { region: zone.replace(ZONE_SUFFIX, ''), volumeId };
}
