/**
 * Tests for worker object download, upload and deletion
 */

import { Readable } from 'node:stream';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Client } from '../../client/index.js';
import { NotFoundError, NotSeekableError, ProtocolError } from '../../errors/index.js';
import { MockHttpTransport, createTestClient, createTestData } from '../../testing/index.js';
import { parseObjectMetadata } from '../index.js';

describe('WorkerObjects', () => {
  let transport: MockHttpTransport;
  let client: Client;

  beforeEach(() => {
    transport = new MockHttpTransport({ chunkSize: 64 });
    client = createTestClient(transport);
  });

  afterEach(async () => {
    await client.close();
  });

  describe('download', () => {
    it('should describe an object from its HEAD response', async () => {
      transport.putObject('videos/intro.mp4', createTestData(1000), {
        bucket: 'default',
        contentType: 'video/mp4',
        etag: '"5d41402abc4b2a76"',
        lastModified: 'Wed, 21 Oct 2015 07:28:00 GMT',
      });

      const object = await client.worker.objects.download('/videos/intro.mp4', { bucket: 'default' });

      expect(object).toMatchObject({
        path: '/videos/intro.mp4',
        bucket: 'default',
        length: 1000,
        contentType: 'video/mp4',
        seekable: true,
        etag: '"5d41402abc4b2a76"',
      });
      expect(object?.lastModified?.getTime()).toBe(Date.UTC(2015, 9, 21, 7, 28, 0));

      const request = transport.requests[0];
      expect(request?.method).toBe('HEAD');
      expect(request?.path).toBe('worker/objects/videos/intro.mp4');
      expect(request?.params).toEqual({ bucket: 'default' });
      expect(transport.liveBodies).toBe(0);
    });

    it('should return null for a missing object', async () => {
      expect(await client.worker.objects.download('missing.bin')).toBeNull();
    });

    it('should not mark objects seekable without byte ranges or bytes', async () => {
      transport.putObject('no-ranges.bin', createTestData(10), { rangeSupport: false });
      transport.putObject('empty.bin', new Uint8Array(0));
      transport.putObject('no-length.bin', createTestData(10), { declareLength: false });

      expect((await client.worker.objects.download('no-ranges.bin'))?.seekable).toBe(false);
      expect((await client.worker.objects.download('empty.bin'))?.seekable).toBe(false);

      const noLength = await client.worker.objects.download('no-length.bin');
      expect(noLength?.seekable).toBe(false);
      expect(noLength?.length).toBeUndefined();
    });

    it('should reject a malformed content length', async () => {
      transport.route('HEAD', 'worker/objects/bad.bin', () => ({ status: 200, headers: { 'content-length': 'ten' } }));

      const error = await client.worker.objects.download('bad.bin').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({ code: 'INVALID_CONTENT_LENGTH' });
    });
  });

  describe('parseObjectMetadata', () => {
    it('should ignore empty content type and etag headers', () => {
      const metadata = parseObjectMetadata('a.bin', undefined, {
        'accept-ranges': 'bytes',
        'content-length': '5',
        'content-type': '',
        etag: '',
      });
      expect(metadata).toEqual({
        path: 'a.bin',
        bucket: undefined,
        length: 5,
        contentType: undefined,
        seekable: true,
        etag: undefined,
        lastModified: undefined,
      });
    });

    it('should reject a malformed last modified date', () => {
      expect(() => parseObjectMetadata('a.bin', undefined, { 'last-modified': 'yesterday' })).toThrow(
        expect.objectContaining({ code: 'INVALID_LAST_MODIFIED' })
      );
    });
  });

  describe('DownloadableObject', () => {
    it('should stream the whole object with a plain GET', async () => {
      const data = createTestData(300);
      transport.putObject('docs/report.pdf', data);
      const object = await client.worker.objects.download('docs/report.pdf');
      if (!object) {
        throw new Error('object should exist');
      }

      const parts: Buffer[] = [];
      for await (const chunk of await object.openStream()) {
        parts.push(Buffer.from(chunk));
      }

      expect(Buffer.concat(parts)).toEqual(Buffer.from(data));
      expect(transport.rangeHeaders()).toEqual([undefined]);
      expect(transport.liveBodies).toBe(0);
    });

    it('should open a seekable stream at an initial offset without a request', async () => {
      const data = createTestData(1000);
      transport.putObject('videos/intro.mp4', data);
      const object = await client.worker.objects.download('videos/intro.mp4');
      if (!object) {
        throw new Error('object should exist');
      }

      const stream = await object.openSeekableStream(500);
      expect(stream.position).toBe(500);
      expect(transport.rangeHeaders()).toEqual([]);

      expect(await stream.read(100)).toEqual(data.subarray(500, 600));
      expect(transport.rangeHeaders()).toEqual(['bytes=500-']);
      await stream.close();
    });

    it('should refuse a seekable stream for objects without range support', async () => {
      transport.putObject('live.ts', createTestData(10), { rangeSupport: false });
      const object = await client.worker.objects.download('live.ts');

      await expect(object?.openSeekableStream()).rejects.toBeInstanceOf(NotSeekableError);
    });
  });

  describe('upload', () => {
    it('should PUT the data with its content type and bucket', async () => {
      await client.worker.objects.upload('/docs/readme.txt', 'hello', {
        contentType: 'text/plain',
        bucket: 'default',
      });

      const request = transport.requests[0];
      expect(request?.method).toBe('PUT');
      expect(request?.path).toBe('worker/objects/docs/readme.txt');
      expect(request?.params).toEqual({ bucket: 'default' });
      expect(request?.headers['content-type']).toBe('text/plain');
      expect(transport.getObject('docs/readme.txt', 'default')).toEqual(new TextEncoder().encode('hello'));
    });

    it('should upload from a readable stream', async () => {
      await client.worker.objects.upload('data.bin', Readable.from([Buffer.from([1, 2]), Buffer.from([3])]));

      expect(Buffer.from(transport.getObject('data.bin') ?? [])).toEqual(Buffer.from([1, 2, 3]));
    });
  });

  describe('delete', () => {
    it('should DELETE a single object', async () => {
      transport.putObject('docs/readme.txt', 'hello', { bucket: 'default' });

      await client.worker.objects.delete('docs/readme.txt', { bucket: 'default' });

      expect(transport.requests[0]?.params).toEqual({ bucket: 'default', batch: 'false' });
      expect(transport.getObject('docs/readme.txt', 'default')).toBeUndefined();
    });

    it('should delete every object under a prefix in batch mode', async () => {
      transport.putObject('docs/a.txt', 'a');
      transport.putObject('docs/b.txt', 'b');
      transport.putObject('other.txt', 'c');

      await client.worker.objects.delete('docs/', { batch: true });

      expect(transport.requests[0]?.params).toEqual({ batch: 'true' });
      expect(transport.getObject('docs/a.txt')).toBeUndefined();
      expect(transport.getObject('docs/b.txt')).toBeUndefined();
      expect(transport.getObject('other.txt')).toBeDefined();
    });

    it('should fail for a missing object', async () => {
      await expect(client.worker.objects.delete('missing.txt')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
