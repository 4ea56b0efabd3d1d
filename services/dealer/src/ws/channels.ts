// Table channels - one WebSocket audience per table, fed by round events

import type { WebSocket } from "ws";
import type { CardDrawnEvent, CommittedEvent, RevealedEvent, RoundResetEvent } from "@fairdraw/shared";
import type { RoundObserver } from "../guard/index.js";
import type {
  WsCardDrawnData,
  WsCommittedData,
  WsMessage,
  WsMessageType,
  WsRevealedData,
  WsRoundResetData,
} from "./types.js";

/**
 * Subscribers grouped by table. Attached to the registry as a round
 * observer, so every committed, revealed, drawn and reset event reaches the
 * sockets watching that table.
 */
export class TableChannels implements RoundObserver {
  private readonly channels = new Map<string, Set<WebSocket>>();

  /**
   * @returns Function leaving the channel again
   */
  join(tableId: string, ws: WebSocket): () => void {
    let sockets = this.channels.get(tableId);
    if (!sockets) {
      sockets = new Set();
      this.channels.set(tableId, sockets);
    }
    sockets.add(ws);
    console.log(`[WS] Watcher joined table ${tableId} (${sockets.size} watching)`);
    return () => this.leave(tableId, ws);
  }

  count(tableId: string): number {
    return this.channels.get(tableId)?.size ?? 0;
  }

  stats(): { tables: number; watchers: number } {
    let watchers = 0;
    for (const sockets of this.channels.values()) {
      watchers += sockets.size;
    }
    return { tables: this.channels.size, watchers };
  }

  onCommitted(event: CommittedEvent): void {
    const data: WsCommittedData = { roundNumber: event.roundNumber, digest: event.digest };
    this.send(event.tableId, "committed", data);
  }

  onRevealed(event: RevealedEvent): void {
    const data: WsRevealedData = { roundNumber: event.roundNumber, secret: event.secret };
    this.send(event.tableId, "revealed", data);
  }

  onCardDrawn(event: CardDrawnEvent): void {
    const data: WsCardDrawnData = {
      roundNumber: event.roundNumber,
      caller: event.caller,
      card: event.card,
      position: event.position,
    };
    this.send(event.tableId, "card_drawn", data);
  }

  onRoundReset(event: RoundResetEvent): void {
    const data: WsRoundResetData = { roundNumber: event.roundNumber };
    this.send(event.tableId, "round_reset", data);
  }

  private leave(tableId: string, ws: WebSocket): void {
    const sockets = this.channels.get(tableId);
    if (!sockets?.delete(ws)) {
      return;
    }
    if (sockets.size === 0) {
      this.channels.delete(tableId);
    }
    console.log(`[WS] Watcher left table ${tableId} (${sockets.size} watching)`);
  }

  private send(tableId: string, type: WsMessageType, data: unknown): void {
    const sockets = this.channels.get(tableId);
    if (!sockets) {
      return;
    }

    const message: WsMessage = { type, tableId, timestamp: new Date().toISOString(), data };
    const payload = JSON.stringify(message);

    for (const ws of [...sockets]) {
      if (ws.readyState !== ws.OPEN) {
        this.leave(tableId, ws);
        continue;
      }
      try {
        ws.send(payload);
      } catch (error) {
        console.error(`[WS] Dropping watcher of table ${tableId}:`, error);
        this.leave(tableId, ws);
      }
    }
  }
}
