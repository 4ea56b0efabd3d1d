export { AccessGuard, AccessError, type GuardedAction } from "./accessGuard.js";
export { ObserverHub, type RoundObserver } from "./observerHub.js";
