export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/** Where the raw spreadsheet bytes come from. */
export interface DataSource {
  read(): AsyncIterable<Buffer>;
  sample(maxBytes?: number): Promise<Buffer>;
  metadata(): SourceMetadata;
}
