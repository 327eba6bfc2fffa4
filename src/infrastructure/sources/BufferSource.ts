import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

/** In-memory data source for text or binary content already loaded. */
export class BufferSource implements DataSource {
  private readonly content: Buffer;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    const fileName = metadata?.fileName ?? 'buffer-input';
    this.meta = {
      fileName,
      fileSize: this.content.length,
      mimeType: metadata?.mimeType ?? detectMimeType(fileName),
    };
  }

  async *read(): AsyncIterable<Buffer> {
    yield await Promise.resolve(this.content);
  }

  sample(maxBytes?: number): Promise<Buffer> {
    if (maxBytes && maxBytes < this.content.length) {
      return Promise.resolve(this.content.subarray(0, maxBytes));
    }
    return Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
