import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { Readable, type Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { Logger } from 'pino';
import { ContentNotReadyError, ContentWriteError, NotFoundError } from './errors.js';
import { CONTENT_EXTENSIONS, type ContentKind, type Job } from './types.js';

export interface ContentSource {
  fetchContent(generationId: string, kind: ContentKind): Promise<Buffer>;
}

export type ContentDestination = string | Writable;

export interface SavedContent {
  generationId: string;
  kind: ContentKind;
  path: string;
  bytes: number;
}

export function contentFileName(generationId: string, kind: ContentKind): string {
  return `${kind}_${generationId}.${CONTENT_EXTENSIONS[kind]}`;
}

export class ContentFetcher {
  constructor(
    private readonly source: ContentSource,
    private readonly logger: Logger
  ) {}

  /**
   * Downloads the content, then hands it to the destination. Nothing is
   * written unless the download completed; file destinations only ever see
   * the complete file.
   */
  async save(generationId: string, kind: ContentKind, destination: ContentDestination): Promise<number> {
    const content = await this.download(generationId, kind);

    if (typeof destination === 'string') {
      await this.writeFileAtomically(destination, content);
      this.logger.info({ generationId, kind, path: destination, bytes: content.length }, 'Content saved');
    } else {
      try {
        await pipeline(Readable.from([content]), destination);
      } catch (error) {
        throw new ContentWriteError('stream', { cause: error });
      }
      this.logger.info({ generationId, kind, bytes: content.length }, 'Content written to stream');
    }

    return content.length;
  }

  /**
   * Saves one file per generation of a succeeded job under `outputDir`.
   */
  async saveJobContent(job: Job, outputDir: string, kind: ContentKind = 'video'): Promise<SavedContent[]> {
    if (job.status !== 'succeeded') {
      throw new ContentNotReadyError(job.id, kind);
    }

    try {
      await mkdir(outputDir, { recursive: true });
    } catch (error) {
      throw new ContentWriteError(outputDir, { cause: error });
    }

    const saved: SavedContent[] = [];
    for (const generation of job.generations) {
      const path = join(outputDir, contentFileName(generation.id, kind));
      const bytes = await this.save(generation.id, kind, path);
      saved.push({ generationId: generation.id, kind, path, bytes });
    }
    return saved;
  }

  private async download(generationId: string, kind: ContentKind): Promise<Buffer> {
    try {
      return await this.source.fetchContent(generationId, kind);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new ContentNotReadyError(generationId, kind, { cause: error });
      }
      throw error;
    }
  }

  private async writeFileAtomically(path: string, content: Buffer): Promise<void> {
    const tempPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.partial`);
    try {
      await writeFile(tempPath, content);
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn({ tempPath, error: String(cleanupError) }, 'Could not remove partial file');
      });
      throw new ContentWriteError(path, { cause: error });
    }
  }
}
