import type { TokenStore } from '../../src/db/tokenStore';
import { copyCredential, type Credential } from '../../src/models/credential';

export class MemoryTokenStore implements TokenStore {
  current: Credential | null;

  saves: Credential[] = [];

  clears = 0;

  failSaves = false;

  failClears = 0;

  constructor(initial: Credential | null = null) {
    this.current = initial ? copyCredential(initial) : null;
  }

  describe(): string {
    return 'memory';
  }

  async load(): Promise<Credential | null> {
    return this.current ? copyCredential(this.current) : null;
  }

  async save(credential: Credential): Promise<void> {
    if (this.failSaves) {
      throw new Error('disk full');
    }

    this.saves.push(copyCredential(credential));
    this.current = copyCredential(credential);
  }

  async clear(): Promise<void> {
    if (this.failClears > 0) {
      this.failClears -= 1;
      throw new Error('read-only file system');
    }

    this.clears += 1;
    this.current = null;
  }
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

export const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((innerResolve, innerReject) => {
    resolve = innerResolve;
    reject = innerReject;
  });

  return { promise, resolve, reject };
};
