/**
 * Error types raised while watching claims and tagging volumes.
 *
 * Only `ConfigError` and `WatchClosedError` are fatal; the claim handler
 * catches every other `TaggerError`, counts it and moves on.
 */

export type TaggerErrorCode =
  | 'CONFIG_INVALID'
  | 'WATCH_CLOSED'
  | 'CLAIM_DECODE_FAILED'
  | 'VOLUME_RESOLUTION_FAILED'
  | 'VOLUME_ID_INVALID'
  | 'TAG_FETCH_FAILED'
  | 'TAG_APPLY_FAILED';

export class TaggerError extends Error {
  constructor(
    public readonly code: TaggerErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TaggerError';
  }
}

export class ConfigError extends TaggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigError';
  }
}

export class WatchClosedError extends TaggerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('WATCH_CLOSED', message, options);
    this.name = 'WatchClosedError';
  }
}

export class ClaimDecodeError extends TaggerError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super('CLAIM_DECODE_FAILED', message);
    this.name = 'ClaimDecodeError';
  }
}

export class VolumeResolutionError extends TaggerError {
  constructor(
    message: string,
    public readonly volumeName: string,
    options?: { cause?: unknown }
  ) {
    super('VOLUME_RESOLUTION_FAILED', message, options);
    this.name = 'VolumeResolutionError';
  }
}

/** The provider volume URL does not have the `scheme://zone/volume-id` shape. */
export class VolumeIdParseError extends TaggerError {
  constructor(public readonly volumeUrl: string, reason: string) {
    super('VOLUME_ID_INVALID', `invalid volume id '${volumeUrl}': ${reason}`);
    this.name = 'VolumeIdParseError';
  }
}

export class TagFetchError extends TaggerError {
  constructor(
    public readonly volumeId: string,
    public readonly region: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('TAG_FETCH_FAILED', message, options);
    this.name = 'TagFetchError';
  }
}

export class TagApplyError extends TaggerError {
  constructor(
    public readonly volumeId: string,
    public readonly tagKey: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('TAG_APPLY_FAILED', message, options);
    this.name = 'TagApplyError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
