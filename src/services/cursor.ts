import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

/** Persistence for the transmitter's delivery cursor (`lastSentIndex`). */
export interface CursorStore {
  load(): Promise<number>;
  save(lastSentIndex: number): Promise<void>;
}

export class MemoryCursorStore implements CursorStore {
  constructor(private value = 0) {}

  load(): Promise<number> {
    return Promise.resolve(this.value);
  }

  save(lastSentIndex: number): Promise<void> {
    this.value = lastSentIndex;
    return Promise.resolve();
  }
}

const CursorFileSchema = z.object({
  lastSentIndex: z.number().int().nonnegative(),
  updatedAt: z.string().optional()
});

/**
 * JSON file holding `{ lastSentIndex, updatedAt }`. Writes go to a temp file
 * first and are renamed into place. A missing file means a fresh cursor at 0.
 */
export class FileCursorStore implements CursorStore {
  constructor(readonly filePath: string, private readonly now: () => Date = () => new Date()) {}

  async load(): Promise<number> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return 0;
      throw e;
    }
    return CursorFileSchema.parse(JSON.parse(text)).lastSentIndex;
  }

  async save(lastSentIndex: number): Promise<void> {
    const body = JSON.stringify({ lastSentIndex, updatedAt: this.now().toISOString() });
    const tmp = `${this.filePath}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tmp, body, 'utf8');
    await fs.rename(tmp, this.filePath);
  }
}
