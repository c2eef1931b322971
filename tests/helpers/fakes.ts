/**
 * In-process stand-ins for the Kubernetes and EC2 collaborators.
 */

import { EC2Client, ServiceInputTypes, ServiceOutputTypes } from '@aws-sdk/client-ec2';
import { vi } from 'vitest';
import { TagApplyError, TagFetchError, VolumeResolutionError } from '../../src/lib/errors';
import type { ClaimWatchSource } from '../../src/services/kube-api';
import {
  EBS_PROVISIONER,
  PROVISIONER_ANNOTATION,
  TAGS_ANNOTATION,
  VolumeTag,
} from '../../src/types/claim';
import type { ClaimVolumeResolver, VolumeRef, VolumeTagStore } from '../../src/types/volume';

// =============================================================================
// EC2
// =============================================================================

export class FakeTagStore implements VolumeTagStore {
  readonly volumes = new Map<string, VolumeTag[]>();
  readonly describeCalls: VolumeRef[] = [];
  readonly created: Array<{ ref: VolumeRef; tag: VolumeTag }> = [];
  readonly failingKeys = new Set<string>();
  failDescribe = false;

  constructor(volumes: Record<string, VolumeTag[]> = {}) {
    for (const [volumeId, tags] of Object.entries(volumes)) {
      this.volumes.set(volumeId, tags.map((tag) => ({ ...tag })));
    }
  }

  async getVolumeTags(ref: VolumeRef): Promise<VolumeTag[]> {
    this.describeCalls.push(ref);
    if (this.failDescribe) {
      throw new TagFetchError(ref.volumeId, ref.region, 'cannot describe volume: throttled');
    }
    const tags = this.volumes.get(ref.volumeId);
    if (!tags) {
      throw new TagFetchError(ref.volumeId, ref.region, 'volume not found in describe response');
    }
    return tags.map((tag) => ({ ...tag }));
  }

  async createVolumeTag(ref: VolumeRef, tag: VolumeTag): Promise<void> {
    if (this.failingKeys.has(tag.key)) {
      throw new TagApplyError(ref.volumeId, tag.key, `cannot create tag '${tag.key}': access denied`);
    }
    this.created.push({ ref, tag });
    const tags = (this.volumes.get(ref.volumeId) ?? []).filter((existing) => existing.key !== tag.key);
    this.volumes.set(ref.volumeId, [...tags, { ...tag }]);
  }
}

export type Ec2Reply = (input: ServiceInputTypes) => ServiceOutputTypes | Promise<ServiceOutputTypes>;

/**
 * A real `EC2Client` whose commands are answered by `reply` in the initialize
 * step, before anything is serialized, signed or sent.
 */
export function inProcessEc2Client(region: string, reply: Ec2Reply): { client: EC2Client; inputs: ServiceInputTypes[] } {
  const client = new EC2Client({ region, credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' } });
  const inputs: ServiceInputTypes[] = [];
  client.middlewareStack.add(
    () => async (args) => {
      inputs.push(args.input);
      return { output: await reply(args.input), response: {} };
    },
    { step: 'initialize', name: 'inProcessEc2', priority: 'high' }
  );
  return { client, inputs };
}

// =============================================================================
// Kubernetes
// =============================================================================

export class FakeVolumeResolver implements ClaimVolumeResolver {
  readonly calls: string[] = [];

  constructor(private readonly volumes: Record<string, string> = {}) {}

  async resolveVolumeUrl(volumeName: string): Promise<string> {
    this.calls.push(volumeName);
    const url = this.volumes[volumeName];
    if (!url) {
      throw new VolumeResolutionError(`cannot read persistent volume '${volumeName}': not found`, volumeName);
    }
    return url;
  }
}

type WatchCallback = (phase: string, apiObj: unknown, watchObj?: unknown) => void;

export class FakeWatch implements ClaimWatchSource {
  readonly handle = { abort: vi.fn() };
  path?: string;
  openError?: Error;
  private callback?: WatchCallback;
  private done?: (err: unknown) => void;

  async watch(
    path: string,
    _queryParams: Record<string, string | number | boolean>,
    callback: WatchCallback,
    done: (err: unknown) => void
  ): Promise<unknown> {
    if (this.openError) throw this.openError;
    this.path = path;
    this.callback = callback;
    this.done = done;
    return this.handle;
  }

  emit(phase: string, object: unknown): void {
    this.callback?.(phase, object);
  }

  end(err: unknown = null): void {
    this.done?.(err);
  }
}

// =============================================================================
// Fixtures
// =============================================================================

export function claimObject(
  overrides: {
    name?: string;
    namespace?: string;
    annotations?: Record<string, string>;
    volumeName?: string;
  } = {}
): Record<string, unknown> {
  return {
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: {
      name: overrides.name ?? 'data-postgres-0',
      namespace: overrides.namespace ?? 'databases',
      annotations: overrides.annotations ?? {},
    },
    spec: {
      accessModes: ['ReadWriteOnce'],
      volumeName: overrides.volumeName ?? '',
    },
  };
}

export function ebsAnnotations(tags?: string, extra: Record<string, string> = {}): Record<string, string> {
  return {
    [PROVISIONER_ANNOTATION]: EBS_PROVISIONER,
    ...(tags !== undefined ? { [TAGS_ANNOTATION]: tags } : {}),
    ...extra,
  };
}

export const flushPromises = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
