import { describe, it, expect } from 'vitest';
import { decodeClaim, isEbsClaim } from '../../src/lib/claims';
import { ClaimDecodeError } from '../../src/lib/errors';
import { claimObject, ebsAnnotations } from '../helpers/fakes';

describe('decodeClaim', () => {
  it('reduces a watch object to the fields the tagger reads', () => {
    const claim = decodeClaim(
      claimObject({ name: 'logs', namespace: 'observability', annotations: ebsAnnotations('env=prod'), volumeName: 'pvc-1' })
    );

    expect(claim).toEqual({
      namespace: 'observability',
      name: 'logs',
      annotations: ebsAnnotations('env=prod'),
      volumeName: 'pvc-1',
    });
  });

  it('treats missing annotations and an empty volume name as absent', () => {
    const claim = decodeClaim({
      metadata: { name: 'scratch', namespace: 'default', annotations: null },
      spec: { volumeName: '' },
    });

    expect(claim.annotations).toEqual({});
    expect(claim.volumeName).toBeUndefined();
  });

  it('rejects objects that are not claims', () => {
    const status = { kind: 'Status', status: 'Failure', message: 'too old resource version' };

    expect(() => decodeClaim(status)).toThrow(ClaimDecodeError);
    expect(() => decodeClaim(undefined)).toThrow('unexpected claim payload');
  });

  it('reports the offending fields', () => {
    let caught: unknown;
    try {
      decodeClaim({ metadata: { namespace: 'default' } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ClaimDecodeError);
    expect(caught instanceof ClaimDecodeError && caught.issues).toEqual(['metadata.name: Required']);
  });
});

describe('isEbsClaim', () => {
  const claim = (annotations: Record<string, string>) => ({ namespace: 'ns', name: 'c', annotations });

  it('accepts the in-tree EBS provisioner', () => {
    expect(isEbsClaim(claim(ebsAnnotations()))).toBe(true);
  });

  it('rejects other or missing provisioners', () => {
    expect(isEbsClaim(claim({}))).toBe(false);
    expect(isEbsClaim(claim({ 'volume.beta.kubernetes.io/storage-provisioner': 'ebs.csi.aws.com' }))).toBe(false);
    expect(isEbsClaim(claim({ 'volume.beta.kubernetes.io/storage-provisioner': 'Kubernetes.io/aws-ebs' }))).toBe(
      false
    );
  });
});
