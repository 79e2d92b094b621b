import type { EdgeConfig } from '@lit-up/shared';

/**
 * Per-container configuration cache.
 *
 * There is no explicit expiry: the loader checks the entry's age on read,
 * and container recycling drops it.
 */
export interface ConfigCache {
  get(): EdgeConfig | null;
  set(config: EdgeConfig): void;
}

export class MemoryConfigCache implements ConfigCache {
  private config: EdgeConfig | null = null;

  get(): EdgeConfig | null {
    return this.config;
  }

  set(config: EdgeConfig): void {
    this.config = config;
  }
}
