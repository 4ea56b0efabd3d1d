export { TableChannels } from "./channels.js";
export { createWsServer, parseTableId, handleClientMessage, type WsServerConfig } from "./server.js";
export type {
  WsMessage,
  WsMessageType,
  WsConnectedData,
  WsCommittedData,
  WsRevealedData,
  WsCardDrawnData,
  WsRoundResetData,
  WsErrorData,
} from "./types.js";
