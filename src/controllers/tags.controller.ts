import { formatTag, hasTag } from '../lib/tags';
import { splitVolumeId } from '../lib/volume';
import type { MetricsRegistry } from '../lib/metrics';
import logger from '../lib/logger';
import type { ClaimContext, VolumeTag } from '../types/claim';
import type { TagReconcileResult, VolumeTagStore } from '../types/volume';

export type TagsControllerOptions = {
  dryRun?: boolean;
};

export class TagsController {
  private readonly log = logger.child('tags');

  constructor(
    private readonly store: VolumeTagStore,
    private readonly metrics: MetricsRegistry,
    private readonly options: TagsControllerOptions = {}
  ) {}

  get dryRun(): boolean {
    return this.options.dryRun ?? false;
  }

  /**
   * Bring the volume behind `volumeUrl` up to date with `tags`:
   * - decompose the URL into region and volume id
   * - fetch the volume's current tags (once, no retry)
   * - skip tags already present with the same value
   * - create every other tag with its own call, unless in dry-run mode
   *
   * Throws `VolumeIdParseError` / `TagFetchError` when the claim cannot be
   * reconciled at all. A failed create only affects that tag.
   */
  async reconcile(context: ClaimContext, volumeUrl: string, tags: VolumeTag[]): Promise<TagReconcileResult> {
    const ref = splitVolumeId(volumeUrl);
    const log = this.log.with({ ...context, volId: ref.volumeId, region: ref.region });

    const current = [...(await this.store.getVolumeTags(ref))];
    log.debug('current volume tags', { tags: current.map(formatTag) });

    const result: TagReconcileResult = { ...ref, applied: [], existing: [], failed: [], skipped: [] };

    for (const tag of tags) {
      const tagLog = log.with({ tagKey: tag.key, tagValue: tag.value });
      tagLog.info('processing EBS volume tag');

      if (hasTag(current, tag)) {
        tagLog.info('tag value already exists');
        this.metrics.inc('tagsExisting');
        result.existing.push(tag);
        continue;
      }

      if (this.dryRun) {
        tagLog.info('running in dry run mode, not adding tag');
        result.skipped.push(tag);
        continue;
      }

      try {
        await this.store.createVolumeTag(ref, tag);
      } catch (err) {
        tagLog.error('error creating tag', { err });
        this.metrics.inc('processingErrors');
        result.failed.push(tag);
        continue;
      }

      this.metrics.inc('tagsAdded');
      result.applied.push(tag);
      // a repeated pair later in the same list now counts as existing
      current.push(tag);
    }

    if (result.applied.length > 0) {
      this.metrics.inc('volumesTagged');
    }

    log.info('volume tags reconciled', {
      applied: result.applied.length,
      existing: result.existing.length,
      failed: result.failed.length,
      skipped: result.skipped.length,
    });
    return result;
  }
}
