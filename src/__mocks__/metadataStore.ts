import { IMetadataStore } from '../domain/interfaces';

/**
 * Map-backed metadata store for tests
 */
export class InMemoryMetadataStore implements IMetadataStore {
  readonly records = new Map<string, Buffer>();
  failWrites = false;
  closed = false;

  get(key: string): Buffer | null {
    return this.records.get(key) ?? null;
  }

  put(key: string, metadata: Buffer): void {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    this.records.set(key, metadata);
  }

  delete(key: string): boolean {
    return this.records.delete(key);
  }

  close(): void {
    this.closed = true;
  }
}
