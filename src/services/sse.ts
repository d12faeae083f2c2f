import type { Response } from 'express';

type Client = {
  id: number;
  res: Response;
};

export function formatEvent(event: string, data: unknown): string {
  return `event: ${event}\n` + `data: ${JSON.stringify(data)}\n\n`;
}

/** Fan-out of server-sent events to every connected `/stream` client. */
export class SseHub<T> {
  private clients = new Map<number, Client>();
  private seq = 0;

  /** Writes the SSE headers and a `hello` event, then registers the response. */
  open(res: Response): number {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();
    const id = ++this.seq;
    this.clients.set(id, { id, res });
    res.write(formatEvent('hello', { ok: true, client: id }));
    return id;
  }

  close(id: number) {
    this.clients.delete(id);
  }

  closeAll() {
    for (const c of this.clients.values()) c.res.end();
    this.clients.clear();
  }

  broadcast(event: string, data: T) {
    if (!this.clients.size) return;
    const payload = formatEvent(event, data);
    for (const c of this.clients.values()) c.res.write(payload);
  }
}
