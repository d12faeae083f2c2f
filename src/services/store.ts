import type { EcgRecord } from '../types/ecg.js';

type Ring<T> = {
  push: (item: T) => void;
  all: () => T[];
  latest: () => T | null;
  size: () => number;
};

export function createRing<T>(capacity: number): Ring<T> {
  const data: T[] = [];
  return {
    push(item: T) {
      if (data.length >= capacity) data.shift();
      data.push(item);
    },
    all() {
      return data.slice().reverse();
    },
    latest() {
      return data.length ? data[data.length - 1] : null;
    },
    size() {
      return data.length;
    }
  };
}

/** Bounded in-memory history of ingested ECG samples, global and per user. */
export class EcgStore {
  private global: Ring<EcgRecord>;
  private perUser = new Map<string, Ring<EcgRecord>>();

  constructor(capacity = 10_000, private readonly perUserCapacity = 5_000) {
    this.global = createRing<EcgRecord>(capacity);
  }

  add(rec: EcgRecord) {
    this.global.push(rec);
    if (!rec.userId) return;
    let ring = this.perUser.get(rec.userId);
    if (!ring) {
      ring = createRing<EcgRecord>(this.perUserCapacity);
      this.perUser.set(rec.userId, ring);
    }
    ring.push(rec);
  }

  addMany(recs: EcgRecord[]) {
    for (const r of recs) this.add(r);
  }

  latest(userId?: string): EcgRecord | null {
    if (userId) return this.perUser.get(userId)?.latest() ?? null;
    return this.global.latest();
  }

  history(userId?: string, limit = 100): EcgRecord[] {
    const list = userId ? this.perUser.get(userId)?.all() ?? [] : this.global.all();
    return list.slice(0, limit);
  }

  count(): number {
    return this.global.size();
  }
}
