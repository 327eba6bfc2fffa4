import { z } from 'zod';
import type { DictionarySource } from '../../domain/ports/DictionarySource.js';
import { parseDataDictionary, type DataDictionary } from '../../domain/model/DataDictionary.js';
import { DictionaryFormatError, DictionaryNotFoundError } from '../../domain/model/errors.js';

export interface UrlDictionarySourceOptions {
  /** Custom HTTP headers to send with the request (e.g. `Authorization`). */
  readonly headers?: Readonly<Record<string, string>>;
  /** Request timeout in milliseconds. Default: `30000` (30 seconds). */
  readonly timeout?: number;
}

const ITEMS_PATH = '/api/1/metastore/schemas/data-dictionary/items';

const itemListSchema = z.array(z.unknown());
const itemIdentifierSchema = z.object({ identifier: z.string() });

/**
 * Loads a data dictionary from a metastore over HTTP.
 *
 * Fetches the dictionary item list from `{baseUrl}/api/1/metastore/schemas/data-dictionary/items`
 * and picks the item whose `identifier` matches. Uses the global Fetch API.
 */
export class UrlDictionarySource implements DictionarySource {
  private readonly url: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;

  constructor(
    baseUrl: string,
    private readonly identifier: string,
    options?: UrlDictionarySourceOptions,
  ) {
    this.url = `${baseUrl.replace(/\/+$/, '')}${ITEMS_PATH}`;
    this.headers = { Accept: 'application/json', ...options?.headers };
    this.timeout = options?.timeout ?? 30000;
  }

  /**
   * @throws DictionaryNotFoundError when no item carries the identifier.
   * @throws DictionaryFormatError when the response or the item has an unexpected shape.
   */
  async load(): Promise<DataDictionary> {
    const response = await this.fetchWithTimeout();

    if (!response.ok) {
      throw new Error(`UrlDictionarySource: HTTP ${String(response.status)} ${response.statusText} for ${this.url}`);
    }

    const payload: unknown = await response.json();
    const items = itemListSchema.safeParse(payload);
    if (!items.success) {
      throw new DictionaryFormatError(`Expected a list of data dictionaries from ${this.url}`);
    }

    const match = items.data.find((item) => {
      const parsed = itemIdentifierSchema.safeParse(item);
      return parsed.success && parsed.data.identifier === this.identifier;
    });
    if (match === undefined) {
      throw new DictionaryNotFoundError(this.identifier);
    }

    return parseDataDictionary(match);
  }

  private async fetchWithTimeout(): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      return await fetch(this.url, {
        headers: this.headers,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
