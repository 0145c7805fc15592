// Library defaults and the process-wide debug switch.

import { z } from "zod";
import { ConfigError } from "./error.js";
import { Logify } from "./logger.js";

export const Default = {
  /** zone of built-in formatters and of `compile` without options */
  zone: "UTC",
  /** locale used for month, weekday and meridiem names */
  locale: "en-US",
  calendar: "iso8601",
  /** column width of `showFormatters` names */
  nameWidth: 40,
} as const;

/** `NODE_DEBUG=chronofmt` turns on debug logging, as for Node's own modules. */
function debugFromEnv(): boolean {
  const flags = process.env.NODE_DEBUG ?? "";
  return flags
    .split(",")
    .map((flag) => flag.trim().toLowerCase())
    .includes("chronofmt");
}

/** Shared logger; only the best-effort resolver writes to it. */
export const logger = new Logify("chronofmt", { debug: debugFromEnv() });

const configSchema = z.object({
  debug: z.boolean().optional(),
});

export type Config = z.infer<typeof configSchema>;

/** Adjust process-wide settings. Returns the settings now in force. */
export function configure(config: Config): Required<Config> {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(`invalid configuration: ${result.error.issues[0].message}`);
  }
  const parsed = result.data;
  if (parsed.debug !== undefined) logger.opts.debug = parsed.debug;
  return { debug: logger.opts.debug };
}
