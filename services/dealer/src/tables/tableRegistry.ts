import type { Address } from "@fairdraw/shared";
import { AccessGuard, type RoundObserver } from "../guard/index.js";
import { DrawSession } from "../session/index.js";
import { EventLog } from "./eventLog.js";

/**
 * Error thrown for table lookups and creation
 */
export class TableError extends Error {
  constructor(
    message: string,
    public code: "TABLE_NOT_FOUND" | "TABLE_EXISTS" | "INVALID_PARAMS"
  ) {
    super(message);
    this.name = "TableError";
  }
}

/**
 * A table owns one draw session and the event log of its current round
 */
export interface Table {
  id: string;
  session: DrawSession;
  events: EventLog;
  createdAt: number;
}

export interface TableRegistryConfig {
  authority: Address;
  /** Deck size for tables created without one */
  defaultDeckSize: number;
  /** Observers attached to every table (e.g. the WebSocket broadcaster) */
  observers?: RoundObserver[];
}

const TABLE_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export function isValidTableId(tableId: unknown): tableId is string {
  return typeof tableId === "string" && TABLE_ID_PATTERN.test(tableId);
}

/**
 * In-memory registry of independent tables keyed by id.
 * Tables never share round state.
 */
export class TableRegistry {
  private tables = new Map<string, Table>();
  private readonly guard: AccessGuard;
  private readonly config: TableRegistryConfig;

  constructor(config: TableRegistryConfig) {
    this.config = config;
    this.guard = new AccessGuard(config.authority);
  }

  get authority(): Address {
    return this.guard.authority;
  }

  /**
   * @throws AccessError if caller may not open tables
   */
  requireAuthority(caller: Address): void {
    this.guard.authorize(caller, "create table");
  }

  /**
   * Open a new table (authority only)
   *
   * @throws AccessError if caller is not the authority
   * @throws TableError INVALID_PARAMS or TABLE_EXISTS
   * @throws SessionError INVALID_DECK_SIZE
   */
  create(caller: Address, tableId: string, deckSize?: number): Table {
    this.requireAuthority(caller);

    if (!isValidTableId(tableId)) {
      throw new TableError(
        "tableId must be 1-64 characters of letters, digits, '-' or '_'",
        "INVALID_PARAMS"
      );
    }
    if (this.tables.has(tableId)) {
      throw new TableError(`Table ${tableId} already exists`, "TABLE_EXISTS");
    }

    const events = new EventLog();
    const session = new DrawSession({
      authority: this.guard.authority,
      deckSize: deckSize ?? this.config.defaultDeckSize,
      tableId,
      observers: [events, ...(this.config.observers ?? [])],
    });

    const table: Table = { id: tableId, session, events, createdAt: Date.now() };
    this.tables.set(tableId, table);

    console.log(`[Tables] opened table ${tableId} with ${session.deckSize} cards`);
    return table;
  }

  /**
   * @throws TableError TABLE_NOT_FOUND
   */
  get(tableId: string): Table {
    const table = this.tables.get(tableId);
    if (!table) {
      throw new TableError(`Table ${tableId} not found`, "TABLE_NOT_FOUND");
    }
    return table;
  }

  has(tableId: string): boolean {
    return this.tables.has(tableId);
  }

  list(): Table[] {
    return [...this.tables.values()];
  }

  size(): number {
    return this.tables.size;
  }
}
