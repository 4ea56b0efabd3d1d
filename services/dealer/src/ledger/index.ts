export { commit, reveal, LedgerError } from "./commitmentLedger.js";
