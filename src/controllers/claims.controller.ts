import type { TagsController } from './tags.controller';
import { decodeClaim, isEbsClaim } from '../lib/claims';
import { ClaimDecodeError, TaggerError, errorMessage } from '../lib/errors';
import type { MetricsRegistry } from '../lib/metrics';
import { formatTag, parseTagSpec, readTagSpec } from '../lib/tags';
import logger, { Logger } from '../lib/logger';
import type { ClaimContext, ClaimEvent, StorageClaim } from '../types/claim';
import type { ClaimVolumeResolver, TagReconcileResult } from '../types/volume';

export type ClaimOutcome =
  | { status: 'ignored'; eventType: string }
  | { status: 'not-ebs' }
  | { status: 'no-tags' }
  | { status: 'unbound' }
  | { status: 'reconciled'; result: TagReconcileResult }
  | { status: 'failed'; error: string };

export class ClaimsController {
  private readonly log = logger.child('claims');

  constructor(
    private readonly volumes: ClaimVolumeResolver,
    private readonly tags: TagsController,
    private readonly metrics: MetricsRegistry
  ) {}

  /**
   * Process one watch event. Never rejects: per-claim failures are logged,
   * counted and reported in the outcome so the watch keeps going.
   */
  async handle(event: ClaimEvent): Promise<ClaimOutcome> {
    this.metrics.inc('eventsProcessed');

    if (event.type !== 'ADDED' && event.type !== 'MODIFIED') {
      this.log.debug('ignoring claim event', { eventType: event.type });
      return { status: 'ignored', eventType: event.type };
    }

    let claim: StorageClaim;
    try {
      claim = decodeClaim(event.object);
    } catch (err) {
      const issues = err instanceof ClaimDecodeError ? err.issues : undefined;
      this.log.warn('skipping event with unexpected payload', { eventType: event.type, issues, err });
      this.metrics.inc('processingErrors');
      return { status: 'failed', error: errorMessage(err) };
    }

    const context: ClaimContext = {
      namespace: claim.namespace,
      volumeClaimName: claim.name,
      volumeName: claim.volumeName,
    };
    const log = this.log.with(context);

    try {
      return await this.process(claim, context, log);
    } catch (err) {
      if (err instanceof TaggerError) {
        log.error('cannot reconcile claim', { code: err.code, err });
      } else {
        log.error('unexpected error while reconciling claim', { err });
      }
      this.metrics.inc('processingErrors');
      return { status: 'failed', error: errorMessage(err) };
    }
  }

  private async process(claim: StorageClaim, context: ClaimContext, log: Logger): Promise<ClaimOutcome> {
    if (!isEbsClaim(claim)) {
      log.warn('volume is not EBS, ignoring');
      return { status: 'not-ebs' };
    }

    const spec = readTagSpec(claim.annotations);
    if (!spec) {
      log.debug('claim has no tag annotation');
      return { status: 'no-tags' };
    }

    const { tags, malformed } = parseTagSpec(spec);
    for (const token of malformed) {
      log.error('skipping malformed tag', { token, separator: spec.separator });
      this.metrics.inc('processingErrors');
    }
    if (tags.length === 0) {
      log.info('no well-formed tags in annotation');
      return { status: 'no-tags' };
    }

    // not an error: the MODIFIED event sent once the claim binds is processed
    if (!claim.volumeName) {
      log.info('claim is not bound to a volume yet, skipping');
      return { status: 'unbound' };
    }

    const volumeUrl = await this.volumes.resolveVolumeUrl(claim.volumeName);
    log.info('processing volume tags', { volumeUrl, tags: tags.map(formatTag) });

    const result = await this.tags.reconcile(context, volumeUrl, tags);
    if (result.skipped.length > 0) {
      log.info('dry run: claim skipped, tags not applied', {
        volId: result.volumeId,
        tags: result.skipped.map(formatTag),
      });
    }
    return { status: 'reconciled', result };
  }
}
