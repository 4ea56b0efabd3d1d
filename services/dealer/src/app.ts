import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { VERSION, type Address } from "@fairdraw/shared";
import { WalletAuth, type WalletAuthConfig } from "./auth/index.js";
import type { RoundObserver } from "./guard/index.js";
import { createAuthRoutes, createTableRoutes } from "./routes/index.js";
import { TableRegistry } from "./tables/index.js";

const DEFAULT_ALLOWED_ORIGINS = ["http://localhost:3000", "http://127.0.0.1:3000"];

export interface DealerAppConfig {
  jwtSecret: string;
  /** Principal allowed to open tables and commit, reveal and reset rounds */
  authority: Address;
  deckSize: number;
  /** Table opened at startup. Omit to start with no tables. */
  defaultTableId?: string;
  corsAllowedOrigins?: string[];
  challengeTtlMs?: number;
  sessionTtlMs?: number;
  /** Observers attached to every table (e.g. the WebSocket broadcaster) */
  observers?: RoundObserver[];
  /** Log every request (default: true) */
  requestLogging?: boolean;
}

export interface AppContext {
  app: Express;
  auth: WalletAuth;
  registry: TableRegistry;
}

/**
 * Create the dealer Express app
 */
export function createApp(config: DealerAppConfig): AppContext {
  const app = express();
  const allowedOrigins = new Set([...DEFAULT_ALLOWED_ORIGINS, ...(config.corsAllowedOrigins ?? [])]);

  // Middleware
  app.use(express.json());
  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && allowedOrigins.has(origin)) {
      res.header("Access-Control-Allow-Origin", origin);
      res.header("Vary", "Origin");
    }
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Content-Type, Authorization");
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });

  if (config.requestLogging ?? true) {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
      next();
    });
  }

  // Only pass defined values to preserve defaults
  const authConfig: WalletAuthConfig = {
    jwtSecret: config.jwtSecret,
    authority: config.authority,
  };
  if (config.challengeTtlMs !== undefined) authConfig.challengeTtlMs = config.challengeTtlMs;
  if (config.sessionTtlMs !== undefined) authConfig.sessionTtlMs = config.sessionTtlMs;

  const auth = new WalletAuth(authConfig);

  const registry = new TableRegistry({
    authority: config.authority,
    defaultDeckSize: config.deckSize,
    observers: config.observers,
  });
  if (config.defaultTableId) {
    registry.create(registry.authority, config.defaultTableId);
  }

  app.use("/auth", createAuthRoutes(auth));
  app.use("/tables", createTableRoutes(registry, auth));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      version: VERSION,
      authority: registry.authority,
      tables: registry.size(),
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found", code: "NOT_FOUND" });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body", code: "INVALID_JSON" });
      return;
    }
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      code: "INTERNAL_ERROR",
    });
  });

  return { app, auth, registry };
}
