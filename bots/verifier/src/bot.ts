import { verifyRound, type VerificationResult } from "@fairdraw/shared";
import { DealerClient, type FetchFn } from "./client.js";

export interface VerifierBotConfig {
  dealerUrl: string;
  tableId: string;
  pollIntervalMs?: number;
  fetch?: FetchFn;
}

export interface VerifierStats {
  checkedRounds: number;
  failedRounds: number;
  errors: number;
  lastCheckedRound: number;
}

/**
 * Watches one table and re-derives every revealed round from its disclosed
 * secret, checking the commitment, the published permutation and each draw.
 */
export class VerifierBot {
  private readonly client: DealerClient;
  private readonly config: VerifierBotConfig;
  private running: boolean = false;
  private lastProgress: string | null = null;
  private lastFailedRound: number | null = null;

  private readonly stats: VerifierStats = {
    checkedRounds: 0,
    failedRounds: 0,
    errors: 0,
    lastCheckedRound: 0,
  };

  constructor(config: VerifierBotConfig) {
    this.config = config;
    this.client = new DealerClient({ baseUrl: config.dealerUrl, fetch: config.fetch });
  }

  getStats(): VerifierStats {
    return { ...this.stats };
  }

  stop(): void {
    this.running = false;
  }

  async run(): Promise<void> {
    this.running = true;
    const pollInterval = this.config.pollIntervalMs ?? 2000;

    console.log(`[Verifier] watching table=${this.config.tableId} at ${this.config.dealerUrl}`);
    console.log(`[Verifier] pollIntervalMs=${pollInterval}`);

    while (this.running) {
      try {
        await this.tick();
      } catch (error) {
        this.stats.errors += 1;
        console.error("[Verifier] tick error:", error);
      }
      if (this.running) {
        await this.sleep(pollInterval);
      }
    }

    console.log("[Verifier] stopped");
    console.log(`[Verifier] stats=${JSON.stringify(this.stats)}`);
  }

  /**
   * Check the table once. Returns null when there is nothing new to verify.
   */
  async tick(): Promise<VerificationResult | null> {
    const { tableId } = this.config;
    const round = await this.client.getRound(tableId);

    if (round.committedDigest === null || round.disclosedSecret === null) {
      return null;
    }

    // Re-check whenever the round or its cursor moved
    const progress = `${round.roundNumber}:${round.cursor}`;
    if (progress === this.lastProgress) {
      return null;
    }

    const drawnCards = await this.client.getDrawnCards(tableId);
    const result = verifyRound({
      deckSize: round.deckSize,
      committedDigest: round.committedDigest,
      secret: round.disclosedSecret,
      permutation: round.permutation,
      drawnCards,
    });

    this.lastProgress = progress;
    if (round.roundNumber !== this.stats.lastCheckedRound) {
      this.stats.checkedRounds += 1;
      this.stats.lastCheckedRound = round.roundNumber;
    }

    if (result.valid) {
      console.log(
        `[Verifier] table=${tableId} round=${round.roundNumber} verified ${drawnCards.length}/${round.deckSize} draws`
      );
    } else {
      // Round numbers only grow, so a repeat failure is always the last one
      if (round.roundNumber !== this.lastFailedRound) {
        this.lastFailedRound = round.roundNumber;
        this.stats.failedRounds += 1;
      }
      console.error(
        `[Verifier] table=${tableId} round=${round.roundNumber} FAILED: ${result.issues.join("; ")}`
      );
    }

    return result;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
