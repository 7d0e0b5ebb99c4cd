import { WebSocket, WebSocketServer } from "ws";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import type { SessionEvent } from "../domain/types.js";
import type { Logger } from "./logger.js";

export const SESSION_EVENTS_PATH = "/session/events";

/** Fans session events out to every page connected on {@link SESSION_EVENTS_PATH}. */
export class SessionEventHub {
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly clients = new Set<WebSocket>();

  public constructor(private readonly logger: Logger) {
    this.wss.on("connection", (ws) => this.attach(ws));
  }

  public handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.wss.emit("connection", ws, req);
    });
  }

  public publish(event: SessionEvent): void {
    const message = JSON.stringify(event);
    for (const ws of this.clients) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(message);
      }
    }
  }

  public size(): number {
    return this.clients.size;
  }

  public close(): void {
    for (const ws of this.clients) {
      ws.terminate();
    }
    this.clients.clear();
    this.wss.close();
  }

  private attach(ws: WebSocket): void {
    this.clients.add(ws);
    this.logger.debug("session event listener connected", { listeners: this.clients.size });

    ws.on("error", (err) => {
      this.logger.warn("session event socket error", { error: err.message });
    });

    ws.on("close", () => {
      this.clients.delete(ws);
    });
  }
}
