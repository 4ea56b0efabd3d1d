export { WalletAuth, AuthError } from "./walletAuth.js";
export { ChallengeBook, signInMessage } from "./challenges.js";
export { SessionTokens } from "./sessionTokens.js";
export type { Caller, CallerRole, SignInChallenge, SignInResult, WalletAuthConfig } from "./types.js";
