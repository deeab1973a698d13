import type { ClusterStatus } from "../types.js";

// ---------------------------------------------------------------------------
// SSE client interface
// ---------------------------------------------------------------------------

export interface SSEClient {
  send: (data: string) => void;
  close: () => void;
}

export interface StatusEvent extends ClusterStatus {
  key: string;
}

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
} as const;

/** `onBroken` fires once when a write fails, so the owner can drop the client. */
export function createSSEStream(onBroken: () => void): {
  readable: ReadableStream<Uint8Array>;
  client: SSEClient;
} {
  const { readable, writable } = new TransformStream<Uint8Array, Uint8Array>();
  const writer = writable.getWriter();
  const encoder = new TextEncoder();
  let broken = false;
  const client: SSEClient = {
    send(data: string) {
      if (broken) return;
      writer.write(encoder.encode(`data: ${data}\n\n`)).catch((err: unknown) => {
        if (broken) return;
        broken = true;
        console.warn("[relay] SSE write failed, dropping client:", err instanceof Error ? err.message : err);
        onBroken();
      });
    },
    close() {
      broken = true;
      writer.close().catch((err: unknown) => {
        console.warn("[relay] SSE close failed:", err instanceof Error ? err.message : err);
      });
    },
  };
  return { readable, client };
}

// ---------------------------------------------------------------------------
// Status relay: fan-out of published snapshot statuses
// ---------------------------------------------------------------------------

export class StatusRelay {
  private readonly clients = new Set<SSEClient>();

  get size(): number {
    return this.clients.size;
  }

  add(client: SSEClient): void {
    this.clients.add(client);
  }

  /** Open a stream whose client is registered here and removed again once a write fails. */
  open(): { readable: ReadableStream<Uint8Array>; client: SSEClient } {
    const stream = createSSEStream(() => this.remove(stream.client));
    this.add(stream.client);
    return stream;
  }

  remove(client: SSEClient): void {
    this.clients.delete(client);
  }

  broadcast(key: string, status: ClusterStatus): void {
    if (this.clients.size === 0) return;
    const event: StatusEvent = { key, ...status };
    const payload = JSON.stringify(event);
    for (const client of this.clients) {
      client.send(payload);
    }
  }
}
