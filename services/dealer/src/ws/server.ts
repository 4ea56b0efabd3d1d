// WebSocket server for table streaming

import { WebSocketServer, type WebSocket, type RawData } from "ws";
import type { IncomingMessage, Server } from "node:http";
import type { TableChannels } from "./channels.js";
import type { WsConnectedData, WsErrorData, WsMessageType } from "./types.js";

export interface WsServerConfig {
  httpServer: Server;
  /** Only accept clients for tables that exist */
  hasTable?: (tableId: string) => boolean;
  channels: TableChannels;
}

export function createWsServer(config: WsServerConfig): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  // Paths carry the table id (/ws/tables/:id), so upgrades are routed by prefix
  config.httpServer.on("upgrade", (req, socket, head) => {
    if (!(req.url ?? "").startsWith("/ws")) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const tableId = parseTableId(req.url ?? "");

    if (!tableId) {
      sendError(ws, "", "INVALID_PATH", "Invalid WebSocket path. Use /ws/tables/:id");
      ws.close(4000, "Invalid path");
      return;
    }
    if (config.hasTable && !config.hasTable(tableId)) {
      sendError(ws, tableId, "TABLE_NOT_FOUND", `Table ${tableId} not found`);
      ws.close(4004, "Unknown table");
      return;
    }

    const leave = config.channels.join(tableId, ws);
    sendConnected(ws, tableId);

    ws.on("message", (data: RawData) => {
      handleClientMessage(ws, tableId, data.toString());
    });

    ws.on("close", leave);

    ws.on("error", (error) => {
      console.error(`[WS] Client error on table ${tableId}:`, error);
      leave();
    });
  });

  console.log(`[WS] WebSocket server initialized on path /ws/tables/:id`);
  return wss;
}

/**
 * Parse the table id from a WebSocket URL.
 * Accepts /ws/tables/:id or /ws?tableId=:id
 */
export function parseTableId(url: string): string | null {
  const pathMatch = url.match(/^\/ws\/tables\/([A-Za-z0-9_-]+)\/?(?:\?.*)?$/);
  if (pathMatch) {
    return pathMatch[1];
  }

  const queryMatch = url.match(/^\/ws\/?\?(?:.*&)?tableId=([A-Za-z0-9_-]+)(?:&.*)?$/);
  if (queryMatch) {
    return queryMatch[1];
  }

  return null;
}

/**
 * Answer a raw client frame. Only ping is understood; anything else gets an error frame.
 */
export function handleClientMessage(ws: WebSocket, tableId: string, raw: string): void {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    sendError(ws, tableId, "INVALID_MESSAGE", "Messages must be JSON");
    return;
  }

  if (isPing(message)) {
    send(ws, tableId, "pong", {});
    return;
  }
  sendError(ws, tableId, "UNSUPPORTED_MESSAGE", "Only {\"type\":\"ping\"} is supported");
}

function isPing(message: unknown): boolean {
  return typeof message === "object" && message !== null && "type" in message && message.type === "ping";
}

function sendConnected(ws: WebSocket, tableId: string): void {
  const data: WsConnectedData = {
    message: `Subscribed to table ${tableId}`,
  };
  send(ws, tableId, "connected", data);
}

function sendError(ws: WebSocket, tableId: string, code: string, message: string): void {
  const data: WsErrorData = { code, message };
  send(ws, tableId, "error", data);
}

function send(ws: WebSocket, tableId: string, type: WsMessageType, data: unknown): void {
  ws.send(
    JSON.stringify({
      type,
      tableId,
      timestamp: new Date().toISOString(),
      data,
    })
  );
}
