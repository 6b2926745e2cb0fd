import type { PageOwnerReportSet } from '@po-tools/parser';

export interface StoredReport {
  filename: string;
  size: number;
  reports: PageOwnerReportSet;
}

/**
 * In-memory store of parsed dumps, keyed by upload ID.
 * Entries expire after `ttlMs`.
 */
export class ReportStore {
  private store = new Map<string, { entry: StoredReport; timestamp: number }>();

  constructor(private readonly ttlMs: number) {}

  set(id: string, entry: StoredReport): void {
    this.store.set(id, { entry, timestamp: Date.now() });
    this.cleanup();
  }

  get(id: string): StoredReport | undefined {
    const item = this.store.get(id);
    if (!item) return undefined;
    if (Date.now() - item.timestamp > this.ttlMs) {
      this.store.delete(id);
      return undefined;
    }
    return item.entry;
  }

  get size(): number {
    return this.store.size;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, item] of this.store) {
      if (now - item.timestamp > this.ttlMs) {
        this.store.delete(key);
      }
    }
  }
}
