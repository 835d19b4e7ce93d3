// Storage Signer
//
// Turns an authorized storage request into a pre-signed URL against an
// S3-compatible bucket. The signer trusts its caller: the access gateway
// checks the identity's level before asking for a signature.

import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { Node, StorageOperation } from '@arbor/protocol';
import type { EngineConfig } from '../config.js';

export type SignRequest = {
  storageKey: string;
  operation: StorageOperation;
  expiresInSeconds: number;
};

export type SignedRequest = {
  url: string;
  method: 'GET' | 'PUT';
};

export interface StorageSigner {
  sign(request: SignRequest): Promise<SignedRequest>;
}

/**
 * Object key for a node's content. Stable across renames and moves.
 */
export function storageKeyFor(node: Pick<Node, 'id' | 'workspaceId'>): string {
  return `workspaces/${node.workspaceId}/nodes/${node.id}`;
}

export class S3StorageSigner implements StorageSigner {
  constructor(
    private client: S3Client,
    private bucket: string
  ) {}

  async sign(request: SignRequest): Promise<SignedRequest> {
    const params = { Bucket: this.bucket, Key: request.storageKey };
    const options = { expiresIn: request.expiresInSeconds };

    if (request.operation === 'write') {
      const url = await getSignedUrl(this.client, new PutObjectCommand(params), options);
      return { url, method: 'PUT' };
    }

    const url = await getSignedUrl(this.client, new GetObjectCommand(params), options);
    return { url, method: 'GET' };
  }
}

export function createS3StorageSigner(config: EngineConfig['storage']): S3StorageSigner {
  const client = new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: config.credentials,
  });
  return new S3StorageSigner(client, config.bucket);
}
