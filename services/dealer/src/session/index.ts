export { DrawSession, SessionError, type DrawSessionConfig } from "./drawSession.js";
export {
  createRound,
  isRevealed,
  type Round,
  type IdleRound,
  type CommittedRound,
  type RevealedRound,
} from "./round.js";
