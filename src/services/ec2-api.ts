import {
  CreateTagsCommand,
  DescribeVolumesCommand,
  DescribeVolumesCommandOutput,
  EC2Client,
} from '@aws-sdk/client-ec2';
import { TagApplyError, TagFetchError, errorMessage } from '../lib/errors';
import logger from '../lib/logger';
import type { VolumeTag } from '../types/claim';
import type { VolumeRef, VolumeTagStore } from '../types/volume';

export type Ec2ApiOptions = {
  clientFactory?: (region: string) => EC2Client;
};

/**
 * EBS tag reads and writes. One SDK client is kept per region, created on
 * first use; credentials come from the SDK's default provider chain.
 */
export class Ec2Api implements VolumeTagStore {
  private readonly log = logger.child('ec2');
  private readonly clients = new Map<string, EC2Client>();
  private readonly clientFactory: (region: string) => EC2Client;

  constructor(options: Ec2ApiOptions = {}) {
    this.clientFactory = options.clientFactory ?? ((region) => new EC2Client({ region }));
  }

  private clientFor(region: string): EC2Client {
    let client = this.clients.get(region);
    if (!client) {
      this.log.debug('creating EC2 client', { region });
      client = this.clientFactory(region);
      this.clients.set(region, client);
    }
    return client;
  }

  async getVolumeTags(ref: VolumeRef): Promise<VolumeTag[]> {
    let output: DescribeVolumesCommandOutput;
    try {
      output = await this.clientFor(ref.region).send(new DescribeVolumesCommand({ VolumeIds: [ref.volumeId] }));
    } catch (err) {
      throw new TagFetchError(ref.volumeId, ref.region, `cannot describe volume: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const volume = output.Volumes?.find((v) => v.VolumeId === ref.volumeId);
    if (!volume) {
      throw new TagFetchError(ref.volumeId, ref.region, 'volume not found in describe response');
    }

    return (volume.Tags ?? []).flatMap((tag) =>
      tag.Key === undefined ? [] : [{ key: tag.Key, value: tag.Value ?? '' }]
    );
  }

  async createVolumeTag(ref: VolumeRef, tag: VolumeTag): Promise<void> {
    try {
      const output = await this.clientFor(ref.region).send(
        new CreateTagsCommand({
          Resources: [ref.volumeId],
          Tags: [{ Key: tag.key, Value: tag.value }],
        })
      );
      this.log.debug('CreateTags response', { volumeId: ref.volumeId, metadata: output.$metadata });
    } catch (err) {
      throw new TagApplyError(ref.volumeId, tag.key, `cannot create tag '${tag.key}': ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  destroy(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }
}
