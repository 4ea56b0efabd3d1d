// Dealer API client for reading published round data

import { isDigest, isSecret, type CardId, type Hash, type Hex, type RoundPhase } from "@fairdraw/shared";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Round data the dealer publishes at GET /tables/:id
 */
export interface PublishedRound {
  tableId: string;
  roundNumber: number;
  phase: RoundPhase;
  deckSize: number;
  committedDigest: Hash | null;
  disclosedSecret: Hex | null;
  cursor: number;
  permutation: CardId[];
}

export interface DealerClientConfig {
  baseUrl: string;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
}

export class DealerClientError extends Error {
  constructor(
    message: string,
    public code: "REQUEST_FAILED" | "INVALID_RESPONSE"
  ) {
    super(message);
    this.name = "DealerClientError";
  }
}

const PHASES: readonly RoundPhase[] = ["idle", "committed", "revealed", "drawing", "exhausted"];

export class DealerClient {
  private baseUrl: string;
  private fetchFn: FetchFn;

  constructor(config: DealerClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, ""); // Remove trailing slash
    this.fetchFn = config.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Current round of a table
   */
  async getRound(tableId: string): Promise<PublishedRound> {
    const body = await this.getJson(`/tables/${encodeURIComponent(tableId)}`);
    const round = parseRound(body);
    if (!round) {
      throw new DealerClientError(`Unexpected round payload for table ${tableId}`, "INVALID_RESPONSE");
    }
    return round;
  }

  /**
   * Cards drawn in the current round, taken from the event log in position order
   */
  async getDrawnCards(tableId: string): Promise<CardId[]> {
    const body = await this.getJson(`/tables/${encodeURIComponent(tableId)}/events`);
    const events = isRecord(body) ? body.events : undefined;
    if (!Array.isArray(events)) {
      throw new DealerClientError(`Unexpected events payload for table ${tableId}`, "INVALID_RESPONSE");
    }

    const draws: { card: CardId; position: number }[] = [];
    for (const event of events) {
      if (!isRecord(event) || event.type !== "card_drawn") continue;
      const { card, position } = event;
      if (typeof card !== "number" || typeof position !== "number") {
        throw new DealerClientError(`Malformed card_drawn event for table ${tableId}`, "INVALID_RESPONSE");
      }
      draws.push({ card, position });
    }

    return draws.sort((a, b) => a.position - b.position).map((draw) => draw.card);
  }

  private async getJson(path: string): Promise<unknown> {
    const res = await this.fetchFn(`${this.baseUrl}${path}`);
    if (!res.ok) {
      throw new DealerClientError(`GET ${path} failed: ${res.status}`, "REQUEST_FAILED");
    }
    return res.json();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPhase(value: unknown): value is RoundPhase {
  return PHASES.some((phase) => phase === value);
}

function isCardList(value: unknown): value is CardId[] {
  return Array.isArray(value) && value.every((card) => typeof card === "number");
}

function parseRound(body: unknown): PublishedRound | null {
  if (!isRecord(body)) return null;
  const { tableId, roundNumber, phase, deckSize, committedDigest, disclosedSecret, cursor, permutation } = body;

  if (
    typeof tableId !== "string" ||
    typeof roundNumber !== "number" ||
    !isPhase(phase) ||
    typeof deckSize !== "number" ||
    typeof cursor !== "number" ||
    !isCardList(permutation)
  ) {
    return null;
  }
  if (committedDigest !== null && !isDigest(committedDigest)) return null;
  if (disclosedSecret !== null && !isSecret(disclosedSecret)) return null;

  return { tableId, roundNumber, phase, deckSize, committedDigest, disclosedSecret, cursor, permutation };
}
