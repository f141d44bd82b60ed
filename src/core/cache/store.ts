import { JsonStateFile, type StateFileOptions } from '../state-file.js';
import { CacheStateSchema, emptyCacheState, type CacheState, type CacheStore } from './types.js';

/** `state/verification-cache.json`, guarded by its `.lock` sibling. */
export class FileCacheStore implements CacheStore {
  private readonly file: JsonStateFile<CacheState>;

  constructor(path: string, opts?: StateFileOptions) {
    this.file = new JsonStateFile(path, CacheStateSchema, emptyCacheState, opts);
  }

  get path(): string {
    return this.file.path;
  }

  read(): Promise<CacheState> {
    return this.file.read();
  }

  update<T>(mutate: (state: CacheState) => T): Promise<T> {
    return this.file.update(mutate);
  }

  replace(state: CacheState): Promise<CacheState | null> {
    return this.file.replace(state);
  }
}
