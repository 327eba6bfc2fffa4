import type { DictionarySource } from '../../domain/ports/DictionarySource.js';
import { parseDataDictionary, type DataDictionary } from '../../domain/model/DataDictionary.js';

/** Dictionary source backed by a payload already in memory (a parsed JSON file, a fixture). */
export class StaticDictionarySource implements DictionarySource {
  constructor(private readonly payload: unknown) {}

  load(): Promise<DataDictionary> {
    return Promise.resolve().then(() => parseDataDictionary(this.payload));
  }
}
