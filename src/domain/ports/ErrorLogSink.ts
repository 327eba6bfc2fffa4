/** Destination for human-readable error reports. */
export interface ErrorLogSink {
  /** Append one titled entry. */
  write(title: string, body: string): Promise<void>;
}
