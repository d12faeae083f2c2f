import type { TransmitConfig } from '../config.js';
import { DeliveryFailure, SourceUnavailableError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { EcgPayload, OutboundRecord } from '../types/ecg.js';
import type { Clock } from '../utils/clock.js';
import { calculateBackoff } from '../utils/retry.js';
import type { CursorStore } from './cursor.js';
import type { LogEntry, LogSlice, RecordLog } from './recordLog.js';

export type TransmitterState = 'idle' | 'polling' | 'batching' | 'sending' | 'stopped';

export type PostInit = {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
};

export type FetchLike = (url: string, init: PostInit) => Promise<{ status: number }>;

export type DeliveryResult =
  | { ok: true; status: number; attempts: number }
  | { ok: false; error: DeliveryFailure; attempts: number };

export type PassResult = {
  /** Rows consumed from the log in this pass, malformed rows included. */
  read: number;
  batches: number;
  delivered: number;
  failed: number;
  /** The pass stopped at a batch it could not deliver. */
  stalled: boolean;
};

export type TransmitterDeps = {
  config: Readonly<TransmitConfig>;
  log: RecordLog;
  cursor: CursorStore;
  clock: Clock;
  logger: Logger;
  fetch?: FetchLike;
  onStateChange?: (state: TransmitterState) => void;
};

type Batch = { records: OutboundRecord[]; end: number };

const SUCCESS = new Set([200, 201]);

// The body is never read; cancelling it hands the socket back to the pool.
const defaultFetch: FetchLike = async (url, init) => {
  const res = await fetch(url, init);
  await res.body?.cancel();
  return { status: res.status };
};

export function partition<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

/**
 * Reads unsent rows from the record log, sends them in ordered batches and
 * advances the delivery cursor. Batches are never sent in parallel.
 */
export class BatchTransmitter {
  private current: TransmitterState = 'idle';
  private lastSent = 0;
  private loaded = false;
  private waiting = false;
  private readonly fetch: FetchLike;

  constructor(private readonly deps: TransmitterDeps) {
    this.fetch = deps.fetch ?? defaultFetch;
  }

  get state(): TransmitterState {
    return this.current;
  }

  get lastSentIndex(): number {
    return this.lastSent;
  }

  toOutbound(sample: { amplitude: number }): OutboundRecord {
    return { timestamp: this.deps.clock.now().toISOString(), ecg_signal: sample.amplitude };
  }

  buildPayload(records: OutboundRecord[]): EcgPayload {
    const { userId } = this.deps.config;
    return userId ? { user_id: userId, data: records } : records;
  }

  /** One POST of one batch. Never throws. */
  async sendBatch(records: OutboundRecord[]): Promise<DeliveryResult> {
    const { endpoint, requestTimeoutMs } = this.deps.config;
    try {
      const res = await this.fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(this.buildPayload(records)),
        signal: AbortSignal.timeout(requestTimeoutMs)
      });
      if (SUCCESS.has(res.status)) return { ok: true, status: res.status, attempts: 1 };
      return { ok: false, error: new DeliveryFailure(records.length, res.status), attempts: 1 };
    } catch (e) {
      return { ok: false, error: new DeliveryFailure(records.length, undefined, { cause: e }), attempts: 1 };
    }
  }

  /**
   * Runs until `signal` aborts (or `maxPasses` polls have happened). A batch
   * already in flight when the signal fires is allowed to finish.
   */
  async runLoop(signal: AbortSignal, options: { maxPasses?: number } = {}): Promise<void> {
    const { clock, config, logger } = this.deps;
    await this.ensureLoaded();
    logger.info(`[tx] starting at offset ${this.lastSent} -> ${config.endpoint}`);
    this.setState('polling');
    let passes = 0;
    while (!signal.aborted && (options.maxPasses === undefined || passes < options.maxPasses)) {
      const pass = await this.runOnce(signal);
      passes++;
      if (signal.aborted || (options.maxPasses !== undefined && passes >= options.maxPasses)) break;
      if (pass.read === 0 || pass.stalled) await clock.sleep(config.pollIntervalMs, signal);
    }
    this.setState('stopped');
    logger.info(`[tx] stopped at offset ${this.lastSent}`);
  }

  /** A single poll: read, batch, send, advance. */
  async runOnce(signal?: AbortSignal): Promise<PassResult> {
    await this.ensureLoaded();
    const { config, clock, logger } = this.deps;
    const result: PassResult = { read: 0, batches: 0, delivered: 0, failed: 0, stalled: false };
    const start = this.lastSent;
    this.setState('polling');

    const slice = await this.read(start);
    for (const bad of slice.malformed) logger.warn(`[tx] skipping malformed row: ${bad.message}`);
    if (slice.end <= start) return result;

    this.setState('batching');
    const batches = this.toBatches(slice.records);
    for (const [i, batch] of batches.entries()) {
      if (signal?.aborted) break;
      if (i > 0 && config.sendIntervalMs > 0) {
        await clock.sleep(config.sendIntervalMs, signal);
        if (signal?.aborted) break;
      }

      this.setState('sending');
      const delivery = await this.deliver(batch.records, signal);
      result.batches++;
      if (delivery.ok) {
        result.delivered++;
        logger.info(`[tx] Successfully sent ${batch.records.length} data points (status ${delivery.status})`);
      } else {
        result.failed++;
        logger.error(`[tx] ${delivery.error.message} (attempts: ${delivery.attempts})`);
        if (config.policy === 'advance-on-success') {
          result.stalled = true;
          this.setState('batching');
          break;
        }
      }
      await this.advance(batch.end);
      this.setState('batching');
    }

    // Rows after the last sent record that were all malformed.
    if (!result.stalled && !signal?.aborted && result.batches === batches.length) {
      await this.advance(slice.end);
    }
    result.read = this.lastSent - start;
    this.setState('polling');
    return result;
  }

  private async deliver(records: OutboundRecord[], signal?: AbortSignal): Promise<DeliveryResult> {
    const { config, clock, logger } = this.deps;
    const maxAttempts = config.policy === 'advance-on-success' ? config.retry.maxAttempts : 1;
    let attempt = 0;
    for (;;) {
      const res = await this.sendBatch(records);
      attempt++;
      if (res.ok || attempt >= maxAttempts || signal?.aborted) return { ...res, attempts: attempt };
      const delay = calculateBackoff(attempt - 1, { baseDelay: config.retry.baseDelayMs });
      logger.warn(`[tx] ${res.error.message}; retrying in ${delay}ms`);
      await clock.sleep(delay, signal);
      if (signal?.aborted) return { ...res, attempts: attempt };
    }
  }

  private toBatches(entries: LogEntry[]): Batch[] {
    return partition(entries, this.deps.config.batchSize).map((group) => ({
      records: group.map((e) => this.toOutbound(e)),
      end: group[group.length - 1].offset + 1
    }));
  }

  private async read(offset: number): Promise<LogSlice> {
    try {
      const slice = await this.deps.log.readFrom(offset);
      this.waiting = false;
      return slice;
    } catch (e) {
      if (!(e instanceof SourceUnavailableError)) {
        this.deps.logger.error(`[tx] reading record log failed: ${errorMessage(e)}`);
      } else if (!this.waiting) {
        this.deps.logger.info(`[tx] waiting for record log ${e.path}`);
        this.waiting = true;
      }
      return { records: [], end: offset, malformed: [] };
    }
  }

  private async advance(to: number): Promise<void> {
    if (to <= this.lastSent) return;
    this.lastSent = to;
    try {
      await this.deps.cursor.save(to);
    } catch (e) {
      this.deps.logger.error(`[tx] persisting cursor ${to} failed: ${errorMessage(e)}`);
    }
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return;
    this.lastSent = await this.deps.cursor.load();
    this.loaded = true;
  }

  private setState(next: TransmitterState) {
    if (next === this.current) return;
    this.current = next;
    this.deps.onStateChange?.(next);
  }
}
