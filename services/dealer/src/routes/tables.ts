import { Router, type Request, type Response, type RequestHandler } from "express";
import { isDigest, isSecret, type Address } from "@fairdraw/shared";
import type { WalletAuth } from "../auth/index.js";
import { AccessError } from "../guard/index.js";
import { LedgerError } from "../ledger/index.js";
import { requireCaller, type CallerRequest } from "../middleware/index.js";
import { SessionError } from "../session/index.js";
import { TableError, type Table, type TableRegistry } from "../tables/index.js";
import { readField, readNumber } from "./body.js";

/**
 * Status code for each domain error code
 */
const STATUS_BY_CODE: Record<string, number> = {
  UNAUTHORIZED: 403,
  ALREADY_COMMITTED: 409,
  NOT_COMMITTED: 409,
  ALREADY_REVEALED: 409,
  SEED_MISMATCH: 400,
  NOT_REVEALED: 409,
  DECK_EXHAUSTED: 409,
  ROUND_IN_PROGRESS: 409,
  INVALID_DECK_SIZE: 400,
  TABLE_NOT_FOUND: 404,
  TABLE_EXISTS: 409,
  INVALID_PARAMS: 400,
};

/**
 * Map a thrown error to a JSON response. Unknown errors become 500.
 */
export function sendTableError(res: Response, err: unknown): void {
  if (
    err instanceof AccessError ||
    err instanceof LedgerError ||
    err instanceof SessionError ||
    err instanceof TableError
  ) {
    res.status(STATUS_BY_CODE[err.code] ?? 400).json({ error: err.message, code: err.code });
    return;
  }
  console.error("[Tables] unexpected error:", err);
  res.status(500).json({ error: "Internal server error", code: "INTERNAL_ERROR" });
}

/**
 * Create table routes. Reads are public; mutations need a wallet session.
 */
export function createTableRoutes(registry: TableRegistry, auth: WalletAuth): Router {
  const router = Router();
  const requireAuth = requireCaller(auth);

  /**
   * Run a handler against an authenticated caller and a looked-up table
   */
  function withCaller(
    handler: (caller: Address, req: CallerRequest, res: Response) => void
  ): RequestHandler {
    return (req: CallerRequest, res: Response) => {
      const caller = req.caller?.address;
      if (!caller) {
        res.status(401).json({ error: "Not authenticated", code: "MISSING_AUTH" });
        return;
      }
      try {
        handler(caller, req, res);
      } catch (err) {
        sendTableError(res, err);
      }
    };
  }

  function lookup(req: Request): Table {
    return registry.get(req.params.id);
  }

  /**
   * POST /tables
   * Open a table (authority only)
   * Body: { tableId, deckSize? }
   */
  router.post(
    "/",
    requireAuth,
    withCaller((caller, req, res) => {
      registry.requireAuthority(caller);
      const tableId = readField(req.body, "tableId");
      const deckSize = readNumber(req.body, "deckSize");

      if (!tableId) {
        res.status(400).json({ error: "Missing required field: tableId", code: "INVALID_PARAMS" });
        return;
      }
      if (deckSize === null) {
        res.status(400).json({ error: "deckSize must be a number", code: "INVALID_DECK_SIZE" });
        return;
      }

      const table = registry.create(caller, tableId, deckSize);
      res.status(201).json(table.session.snapshot());
    })
  );

  /**
   * GET /tables
   * Summary of every table
   */
  router.get("/", (_req: Request, res: Response) => {
    res.json({
      tables: registry.list().map((table) => ({
        tableId: table.id,
        phase: table.session.phase,
        remaining: table.session.remaining(),
        roundNumber: table.session.roundNumber,
      })),
    });
  });

  /**
   * GET /tables/:id
   * Snapshot of the current round
   */
  router.get("/:id", (req: Request, res: Response) => {
    try {
      res.json(lookup(req).session.snapshot());
    } catch (err) {
      sendTableError(res, err);
    }
  });

  router.get("/:id/remaining", (req: Request, res: Response) => {
    try {
      const table = lookup(req);
      res.json({ tableId: table.id, remaining: table.session.remaining() });
    } catch (err) {
      sendTableError(res, err);
    }
  });

  /**
   * GET /tables/:id/permutation
   * Empty until the round is revealed
   */
  router.get("/:id/permutation", (req: Request, res: Response) => {
    try {
      const table = lookup(req);
      res.json({
        tableId: table.id,
        roundNumber: table.session.roundNumber,
        permutation: table.session.getPermutation(),
      });
    } catch (err) {
      sendTableError(res, err);
    }
  });

  /**
   * GET /tables/:id/events
   * Events of the current round, oldest first
   */
  router.get("/:id/events", (req: Request, res: Response) => {
    try {
      const table = lookup(req);
      res.json({ tableId: table.id, events: table.events.list() });
    } catch (err) {
      sendTableError(res, err);
    }
  });

  /**
   * POST /tables/:id/commit
   * Body: { digest } - keccak256 of the secret
   */
  router.post(
    "/:id/commit",
    requireAuth,
    withCaller((caller, req, res) => {
      const table = lookup(req);
      table.session.requireAuthority(caller, "commit");
      const digest = readField(req.body, "digest");
      if (!isDigest(digest)) {
        res.status(400).json({
          error: "digest must be 0x-prefixed 64 hex characters",
          code: "INVALID_DIGEST",
        });
        return;
      }

      table.session.commit(caller, digest);
      res.json(table.session.snapshot());
    })
  );

  /**
   * POST /tables/:id/reveal
   * Body: { secret } - 0x-prefixed hex bytes
   */
  router.post(
    "/:id/reveal",
    requireAuth,
    withCaller((caller, req, res) => {
      const table = lookup(req);
      table.session.requireAuthority(caller, "reveal");
      const secret = readField(req.body, "secret");
      if (!isSecret(secret)) {
        res.status(400).json({
          error: "secret must be 0x-prefixed hex of whole bytes",
          code: "INVALID_SECRET",
        });
        return;
      }

      table.session.reveal(caller, secret);
      res.json(table.session.snapshot());
    })
  );

  /**
   * POST /tables/:id/draw
   * Open to any authenticated caller
   */
  router.post(
    "/:id/draw",
    requireAuth,
    withCaller((caller, req, res) => {
      const table = lookup(req);
      const position = table.session.deckSize - table.session.remaining();
      const card = table.session.draw(caller);
      res.json({ card, position, remaining: table.session.remaining() });
    })
  );

  router.post(
    "/:id/reset",
    requireAuth,
    withCaller((caller, req, res) => {
      const table = lookup(req);
      table.session.reset(caller);
      res.json(table.session.snapshot());
    })
  );

  return router;
}
