import { JsonStateFile, type StateFileOptions } from '../state-file.js';
import { emptyLockState, LockStateSchema, type LockState, type LockStore } from './types.js';

/** `state/locks.json`, guarded by `state/locks.json.lock`. */
export class FileLockStore implements LockStore {
  private readonly file: JsonStateFile<LockState>;

  constructor(path: string, opts?: StateFileOptions) {
    this.file = new JsonStateFile(path, LockStateSchema, emptyLockState, opts);
  }

  get path(): string {
    return this.file.path;
  }

  read(): Promise<LockState> {
    return this.file.read();
  }

  update<T>(mutate: (state: LockState) => T): Promise<T> {
    return this.file.update(mutate);
  }
}

/** In-process store for embedding and tests. */
export class MemoryLockStore implements LockStore {
  private state: LockState = emptyLockState();

  async read(): Promise<LockState> {
    return structuredClone(this.state);
  }

  async update<T>(mutate: (state: LockState) => T): Promise<T> {
    const draft = structuredClone(this.state);
    const result = mutate(draft);
    this.state = draft;
    return result;
  }
}
