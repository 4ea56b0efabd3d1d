import type {
  CardDrawnEvent,
  CommittedEvent,
  RevealedEvent,
  RoundEvent,
  RoundResetEvent,
} from "@fairdraw/shared";

/**
 * External subscriber to round events. Every hook is optional.
 */
export interface RoundObserver {
  onCommitted?(event: CommittedEvent): void;
  onRevealed?(event: RevealedEvent): void;
  onCardDrawn?(event: CardDrawnEvent): void;
  onRoundReset?(event: RoundResetEvent): void;
}

/**
 * Ordered fan-out of round events to observers.
 *
 * Events are published after the state change they describe. A failing
 * observer is logged and skipped; it never undoes the change or blocks the
 * observers after it.
 */
export class ObserverHub {
  private observers: RoundObserver[] = [];

  constructor(observers: RoundObserver[] = []) {
    this.observers = [...observers];
  }

  /**
   * Register an observer
   * @returns Function removing the observer again
   */
  add(observer: RoundObserver): () => void {
    this.observers.push(observer);
    return () => {
      this.observers = this.observers.filter((o) => o !== observer);
    };
  }

  publish(event: RoundEvent): void {
    for (const observer of [...this.observers]) {
      try {
        dispatch(observer, event);
      } catch (error) {
        console.error(`[Observer] ${event.type} handler failed for table ${event.tableId}:`, error);
      }
    }
  }
}

function dispatch(observer: RoundObserver, event: RoundEvent): void {
  switch (event.type) {
    case "committed":
      observer.onCommitted?.(event);
      break;
    case "revealed":
      observer.onRevealed?.(event);
      break;
    case "card_drawn":
      observer.onCardDrawn?.(event);
      break;
    case "round_reset":
      observer.onRoundReset?.(event);
      break;
  }
}
