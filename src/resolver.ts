import type { Temporal } from "@js-temporal/polyfill";
import { logger } from "./defaults.js";
import { NoMatchError, TimeFormatError } from "./error.js";
import { registry } from "./registry.js";

/**
 * Try every parse-capable built-in formatter in name order and return the
 * first successful result. Candidates may overlap, so the order is fixed.
 */
export function parseAny(text: string): Temporal.Instant {
  for (const entry of registry.values()) {
    if (!entry.canParse) continue;
    try {
      const instant = entry.formatter.parse(text);
      logger.debug(`'${text}' matched ${entry.name}`);
      return instant;
    } catch (err) {
      if (!(err instanceof TimeFormatError)) throw err;
      logger.debug(`'${text}' rejected by ${entry.name}: ${err.message}`);
    }
  }
  throw new NoMatchError(text);
}
