import type { Logger } from "../logger.js";
import type { Store } from "./store/types.js";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Request-independent handles every ledger and the engine are built from. */
export type LedgerContext = {
  store: Store;
  log: Logger;
  clock: Clock;
};
