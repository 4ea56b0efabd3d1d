// WebSocket message types for table streaming

import type { Address, CardId, Hash, Hex } from "@fairdraw/shared";

export type WsMessageType =
  | "connected"
  | "committed"
  | "revealed"
  | "card_drawn"
  | "round_reset"
  | "pong"
  | "error";

export interface WsMessage {
  type: WsMessageType;
  tableId: string;
  timestamp: string;
  data: unknown;
}

export interface WsConnectedData {
  message: string;
}

export interface WsCommittedData {
  roundNumber: number;
  digest: Hash;
}

export interface WsRevealedData {
  roundNumber: number;
  secret: Hex;
}

export interface WsCardDrawnData {
  roundNumber: number;
  caller: Address;
  card: CardId;
  position: number;
}

export interface WsRoundResetData {
  roundNumber: number;
}

export interface WsErrorData {
  code: string;
  message: string;
}
