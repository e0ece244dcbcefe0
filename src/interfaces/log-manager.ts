import type { FullLogger } from "./logger.js";

/** A class (any constructor) or a plain name a logger is obtained on behalf of. */
export type LogOwner = string | (abstract new (...args: never[]) => unknown);

export interface LogManager {
  getLogger(owner: LogOwner): FullLogger;
}
