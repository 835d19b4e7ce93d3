import { describe, it, expect } from 'vitest';
import { createS3StorageSigner, storageKeyFor } from './signer.js';

const signer = createS3StorageSigner({
  bucket: 'test-bucket',
  region: 'us-east-1',
  endpoint: 'http://localhost:9000',
  forcePathStyle: true,
  credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
  urlTtlSeconds: 300,
});

describe('storageKeyFor', () => {
  it('keys objects by workspace and node id', () => {
    expect(storageKeyFor({ id: '42', workspaceId: '7' })).toBe('workspaces/7/nodes/42');
  });
});

describe('S3StorageSigner', () => {
  it('signs a GET for reads', async () => {
    const signed = await signer.sign({
      storageKey: 'workspaces/7/nodes/42',
      operation: 'read',
      expiresInSeconds: 300,
    });

    const url = new URL(signed.url);
    expect(signed.method).toBe('GET');
    expect(url.origin).toBe('http://localhost:9000');
    expect(url.pathname).toBe('/test-bucket/workspaces/7/nodes/42');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('300');
    expect(url.searchParams.get('X-Amz-Signature')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('signs a PUT for writes', async () => {
    const signed = await signer.sign({
      storageKey: 'workspaces/7/nodes/42',
      operation: 'write',
      expiresInSeconds: 60,
    });

    const url = new URL(signed.url);
    expect(signed.method).toBe('PUT');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('60');
    expect(url.searchParams.get('X-Amz-Credential')).toMatch(/^test-key\//);
  });
});
