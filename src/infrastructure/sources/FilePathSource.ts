import { createReadStream, statSync } from 'node:fs';
import { open } from 'node:fs/promises';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Data source that streams a local file as binary chunks. */
export class FilePathSource implements DataSource {
  private readonly highWaterMark: number;

  constructor(
    private readonly filePath: string,
    options?: FilePathSourceOptions,
  ) {
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<Buffer> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.highWaterMark });

    for await (const chunk of stream) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    }
  }

  async sample(maxBytes?: number): Promise<Buffer> {
    const handle = await open(this.filePath, 'r');
    try {
      const size = maxBytes ?? (await handle.stat()).size;
      const buffer = Buffer.alloc(size);
      const { bytesRead } = await handle.read(buffer, 0, size, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath);
    return {
      fileName: basename(this.filePath),
      fileSize: stats.size,
      mimeType: detectMimeType(this.filePath),
    };
  }
}
