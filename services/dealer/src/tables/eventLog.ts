import type { RoundEvent } from "@fairdraw/shared";
import type { RoundObserver } from "../guard/index.js";

/**
 * Append-only log of the current round's events for one table.
 * Cleared when the round is reset; the reset event opens the new log.
 */
export class EventLog implements RoundObserver {
  private events: RoundEvent[] = [];

  onCommitted(event: RoundEvent): void {
    this.events.push(event);
  }

  onRevealed(event: RoundEvent): void {
    this.events.push(event);
  }

  onCardDrawn(event: RoundEvent): void {
    this.events.push(event);
  }

  onRoundReset(event: RoundEvent): void {
    this.events = [event];
  }

  list(): RoundEvent[] {
    return [...this.events];
  }

  size(): number {
    return this.events.length;
  }
}
