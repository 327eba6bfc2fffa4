import type { DataDictionary } from '../model/DataDictionary.js';

/** Supplies the data dictionary a Schema is built from. */
export interface DictionarySource {
  load(): Promise<DataDictionary>;
}
