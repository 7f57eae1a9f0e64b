import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ContentFetcher, contentFileName, type ContentSource } from '../content.js';
import { ContentNotReadyError, ContentWriteError, NotFoundError, ServiceError } from '../errors.js';
import { parseJob } from '../resources.js';
import type { ContentKind } from '../types.js';
import { silentLogger, wireGeneration, wireJob } from './fakeService.js';

const VIDEO_BYTES = Buffer.from('fake-mp4-bytes');

function sourceReturning(content: Buffer) {
  const fetchContent = vi.fn(async (_generationId: string, _kind: ContentKind) => content);
  return { fetchContent };
}

function notFoundSource(): ContentSource {
  return {
    fetchContent: async () => {
      throw new NotFoundError('Generation content not found', 404, '{"error":{"message":"Generation content not found"}}');
    }
  };
}

describe('ContentFetcher', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'video-client-content-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the complete file and leaves no temporary file behind', async () => {
    const fetcher = new ContentFetcher(sourceReturning(VIDEO_BYTES), silentLogger);
    const target = join(dir, 'out.mp4');

    const bytes = await fetcher.save('gen_1', 'video', target);

    expect(bytes).toBe(VIDEO_BYTES.length);
    expect(await readFile(target, 'utf8')).toBe('fake-mp4-bytes');
    expect(await readdir(dir)).toEqual(['out.mp4']);
  });

  it('reports content of a failed job as not ready and writes nothing', async () => {
    const fetcher = new ContentFetcher(notFoundSource(), silentLogger);
    const target = join(dir, 'out.mp4');

    const error = await fetcher.save('gen_1', 'video', target).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ContentNotReadyError);
    if (error instanceof ContentNotReadyError) {
      expect(error.generationId).toBe('gen_1');
      expect(error.kind).toBe('video');
      expect(error.cause).toBeInstanceOf(NotFoundError);
    }
    expect(await readdir(dir)).toEqual([]);
  });

  it('passes other service errors through', async () => {
    const fetcher = new ContentFetcher(
      {
        fetchContent: async () => {
          throw new ServiceError('HTTP 500', 500, '');
        }
      },
      silentLogger
    );

    await expect(fetcher.save('gen_1', 'gif', join(dir, 'out.gif'))).rejects.toBeInstanceOf(ServiceError);
    expect(await readdir(dir)).toEqual([]);
  });

  it('raises a write error when the destination directory is missing', async () => {
    const fetcher = new ContentFetcher(sourceReturning(VIDEO_BYTES), silentLogger);
    const target = join(dir, 'missing', 'out.mp4');

    const error = await fetcher.save('gen_1', 'video', target).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ContentWriteError);
    if (error instanceof ContentWriteError) {
      expect(error.destination).toBe(target);
    }
    expect(await readdir(dir)).toEqual([]);
  });

  it('writes into a stream destination', async () => {
    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      }
    });
    const fetcher = new ContentFetcher(sourceReturning(Buffer.from('GIF89a')), silentLogger);

    await fetcher.save('gen_1', 'gif', sink);

    expect(Buffer.concat(chunks).toString()).toBe('GIF89a');
  });

  it('wraps stream failures as write errors', async () => {
    const sink = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('disk full'));
      }
    });
    const fetcher = new ContentFetcher(sourceReturning(VIDEO_BYTES), silentLogger);

    await expect(fetcher.save('gen_1', 'video', sink)).rejects.toBeInstanceOf(ContentWriteError);
  });

  it('saves every generation of a succeeded job', async () => {
    const source = sourceReturning(VIDEO_BYTES);
    const fetcher = new ContentFetcher(source, silentLogger);
    const job = parseJob(
      wireJob({ status: 'succeeded', generations: [wireGeneration(), wireGeneration({ id: 'gen_2' })] })
    );
    const outputDir = join(dir, 'outputs');

    const saved = await fetcher.saveJobContent(job, outputDir, 'video');

    expect(saved).toEqual([
      { generationId: 'gen_1', kind: 'video', path: join(outputDir, 'video_gen_1.mp4'), bytes: VIDEO_BYTES.length },
      { generationId: 'gen_2', kind: 'video', path: join(outputDir, 'video_gen_2.mp4'), bytes: VIDEO_BYTES.length }
    ]);
    expect((await readdir(outputDir)).sort()).toEqual(['video_gen_1.mp4', 'video_gen_2.mp4']);
    expect(source.fetchContent).toHaveBeenCalledWith('gen_2', 'video');
  });

  it('refuses to download for a job that has not succeeded', async () => {
    const source = sourceReturning(VIDEO_BYTES);
    const fetcher = new ContentFetcher(source, silentLogger);
    const job = parseJob(wireJob({ status: 'failed' }));

    await expect(fetcher.saveJobContent(job, join(dir, 'outputs'))).rejects.toBeInstanceOf(ContentNotReadyError);
    expect(source.fetchContent).not.toHaveBeenCalled();
    expect(await readdir(dir)).toEqual([]);
  });
});

describe('contentFileName', () => {
  it('uses the extension of the content kind', () => {
    expect(contentFileName('gen_9', 'video')).toBe('video_gen_9.mp4');
    expect(contentFileName('gen_9', 'gif')).toBe('gif_gen_9.gif');
  });
});
