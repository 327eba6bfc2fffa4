import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ErrorLogSink } from '../../domain/ports/ErrorLogSink.js';

export interface FileErrorLogOptions {
  /** Log file path. Default: `'errors.log'`. */
  readonly filePath?: string;
  /** Clock for entry timestamps. Default: `() => new Date()`. */
  readonly now?: () => Date;
}

/**
 * Error log that appends timestamped entries to a text file.
 *
 * Each entry is `\n[<ISO timestamp>] <title>:\n<body>\n`. The parent directory
 * is created when missing. Node.js only.
 */
export class FileErrorLog implements ErrorLogSink {
  readonly filePath: string;
  private readonly now: () => Date;

  constructor(options?: FileErrorLogOptions) {
    this.filePath = options?.filePath ?? 'errors.log';
    this.now = options?.now ?? (() => new Date());
  }

  async write(title: string, body: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `\n[${this.now().toISOString()}] ${title}:\n${body}\n`, 'utf-8');
  }
}
