import type { ClientCommand, ClientConnection } from "../../src/shared/protocol.ts";
import { silentLogger, type Logger } from "./log.ts";
import type { SessionServer } from "./sessionServer.ts";

export type SessionEvent =
  | { type: "connect"; connection: ClientConnection }
  | { type: "command"; connection: ClientConnection; command: ClientCommand }
  | { type: "disconnect"; connection: ClientConnection };

export type SessionEventLoopOpts = {
  tickMs?: number;
  maxEventsPerTick?: number;
  logger?: Logger;
};

/**
 * Transport callbacks only enqueue. Each tick drains events in receipt
 * order, one at a time, then pairs whoever is waiting.
 */
export class SessionEventLoop {
  private readonly events: SessionEvent[] = [];
  private readonly tickMs: number;
  private readonly maxEventsPerTick: number;
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly sessions: SessionServer,
    opts: SessionEventLoopOpts = {},
  ) {
    this.tickMs = Math.max(1, Math.floor(opts.tickMs ?? 10));
    this.maxEventsPerTick = Math.max(1, Math.floor(opts.maxEventsPerTick ?? 256));
    this.log = opts.logger ?? silentLogger;
  }

  enqueue(event: SessionEvent): void {
    this.events.push(event);
  }

  pending(): number {
    return this.events.length;
  }

  /** Returns how many events were handled. */
  tick(): number {
    let handled = 0;
    while (handled < this.maxEventsPerTick) {
      const event = this.events.shift();
      if (!event) break;
      handled++;
      try {
        this.handle(event);
      } catch (err) {
        this.log.error(`${event.type} event from ${event.connection.id} failed`, err);
      }
    }
    this.sessions.pairWaiting();
    return handled;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.tickMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  private handle(event: SessionEvent): void {
    switch (event.type) {
      case "connect":
        this.sessions.connect(event.connection);
        return;
      case "command":
        this.sessions.handleCommand(event.connection, event.command);
        return;
      case "disconnect":
        this.sessions.disconnect(event.connection);
        return;
    }
  }
}
