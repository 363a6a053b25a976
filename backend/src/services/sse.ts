import type { Response } from 'express';

type Client = {
  id: number;
  res: Response;
};

export function openEventStream(res: Response) {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();
}

export function writeEvent(res: Response, event: string, data: unknown, id?: number | string) {
  const head = id === undefined ? '' : `id: ${id}\n`;
  res.write(`${head}event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

/** Fan-out of one event type to every connected stream. */
export class SseHub<T> {
  private clients = new Map<number, Client>();
  private seq = 0;

  addClient(res: Response): number {
    const id = ++this.seq;
    this.clients.set(id, { id, res });
    return id;
  }

  removeClient(id: number) {
    this.clients.delete(id);
  }

  size(): number {
    return this.clients.size;
  }

  broadcast(event: string, data: T) {
    for (const c of this.clients.values()) {
      writeEvent(c.res, event, data);
    }
  }

  // comment lines keep proxies from closing idle streams
  ping() {
    for (const c of this.clients.values()) c.res.write(': ping\n\n');
  }

  closeAll() {
    for (const c of this.clients.values()) c.res.end();
    this.clients.clear();
  }
}
