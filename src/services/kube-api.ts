import { CoreV1Api, KubeConfig, Watch } from '@kubernetes/client-node';
import { ConfigError, VolumeResolutionError, WatchClosedError, errorMessage } from '../lib/errors';
import logger from '../lib/logger';
import type { ClaimEvent } from '../types/claim';
import type { ClaimVolumeResolver } from '../types/volume';

/** The part of `Watch` the claim consumer relies on. */
export interface ClaimWatchSource {
  watch(
    path: string,
    queryParams: Record<string, string | number | boolean>,
    callback: (phase: string, apiObj: unknown, watchObj?: unknown) => void,
    done: (err: unknown) => void
  ): Promise<unknown>;
}

/** The part of `CoreV1Api` used to resolve a claim's bound volume. */
export interface PersistentVolumeReader {
  readPersistentVolume(name: string): Promise<{
    body: { spec?: { awsElasticBlockStore?: { volumeID: string } } };
  }>;
}

export type KubeApiOptions = {
  namespace?: string;
};

export type KubeConnectOptions = {
  local: boolean;
  kubeconfig?: string;
};

export function loadKubeConfig(options: KubeConnectOptions): KubeConfig {
  const kc = new KubeConfig();
  try {
    if (!options.local) {
      kc.loadFromCluster();
    } else if (options.kubeconfig) {
      kc.loadFromFile(options.kubeconfig);
    } else {
      kc.loadFromDefault();
    }
  } catch (err) {
    const source = options.local ? `kubeconfig ${options.kubeconfig ?? '(default)'}` : 'in-cluster config';
    throw new ConfigError(`failed to load ${source}: ${errorMessage(err)}`, { cause: err });
  }
  if (!kc.getCurrentCluster()) {
    throw new ConfigError('kubeconfig has no current cluster');
  }
  return kc;
}

const isAbortable = (handle: unknown): handle is { abort: () => void } =>
  typeof handle === 'object' &&
  handle !== null &&
  'abort' in handle &&
  typeof handle.abort === 'function';

/**
 * Thin wrapper around the Kubernetes API: resolves bound volumes and
 * consumes the claim watch one event at a time.
 */
export class KubeApi implements ClaimVolumeResolver {
  private readonly log = logger.child('kube');
  private readonly namespace?: string;
  private watchHandle?: unknown;
  private closing = false;

  constructor(
    private readonly core: PersistentVolumeReader,
    private readonly watcher: ClaimWatchSource,
    options: KubeApiOptions = {}
  ) {
    this.namespace = options.namespace;
  }

  static fromKubeConfig(kc: KubeConfig, options: KubeApiOptions = {}): KubeApi {
    return new KubeApi(kc.makeApiClient(CoreV1Api), new Watch(kc), options);
  }

  get claimsPath(): string {
    return this.namespace
      ? `/api/v1/namespaces/${encodeURIComponent(this.namespace)}/persistentvolumeclaims`
      : '/api/v1/persistentvolumeclaims';
  }

  async resolveVolumeUrl(volumeName: string): Promise<string> {
    let response: Awaited<ReturnType<PersistentVolumeReader['readPersistentVolume']>>;
    try {
      response = await this.core.readPersistentVolume(volumeName);
    } catch (err) {
      throw new VolumeResolutionError(
        `cannot read persistent volume '${volumeName}': ${errorMessage(err)}`,
        volumeName,
        { cause: err }
      );
    }

    const volumeUrl = response.body.spec?.awsElasticBlockStore?.volumeID;
    if (!volumeUrl) {
      throw new VolumeResolutionError(`persistent volume '${volumeName}' is not backed by EBS`, volumeName);
    }
    return volumeUrl;
  }

  /**
   * Start the claim watch and hand each event to `onEvent`, strictly in
   * arrival order: an event is only dispatched once the previous one settled.
   *
   * The returned promise rejects with `WatchClosedError` when the stream
   * ends or fails, and resolves only after `close()`.
   */
  watchClaims(onEvent: (event: ClaimEvent) => Promise<void>): Promise<void> {
    let queue: Promise<void> = Promise.resolve();

    const dispatch = (phase: string, object: unknown) => {
      queue = queue
        .then(() => onEvent({ type: phase, object }))
        .catch((err) => {
          this.log.error('claim event handler failed', { phase, err });
        });
    };

    return new Promise<void>((resolve, reject) => {
      const done = (err: unknown) => {
        void queue.then(() => {
          if (this.closing) {
            this.log.info('claim watch closed');
            resolve();
            return;
          }
          const reason = err ? `claim watch failed: ${errorMessage(err)}` : 'claim watch stream ended';
          reject(new WatchClosedError(reason, err ? { cause: err } : undefined));
        });
      };

      this.log.info('watching persistent volume claims', { path: this.claimsPath });
      void this.watcher.watch(this.claimsPath, {}, dispatch, done).then(
        (handle) => {
          this.watchHandle = handle;
        },
        (err: unknown) => {
          reject(new WatchClosedError(`failed to open claim watch: ${errorMessage(err)}`, { cause: err }));
        }
      );
    });
  }

  close(): void {
    this.closing = true;
    if (isAbortable(this.watchHandle)) {
      this.watchHandle.abort();
    }
  }
}
