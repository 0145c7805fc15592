import { Temporal } from "@js-temporal/polyfill";
import { Default } from "./defaults.js";
import { registry } from "./registry.js";

/**
 * Print `instant` with every print-capable built-in formatter, one line per
 * formatter, and return the lines.
 */
export function showFormatters(
  instant: Temporal.Instant = Temporal.Now.instant(),
  write: (line: string) => void = console.log,
): string[] {
  const lines: string[] = [];
  for (const entry of registry.values()) {
    if (!entry.canPrint) continue;
    const line = entry.name.padEnd(Default.nameWidth) + entry.formatter.print(instant);
    write(line);
    lines.push(line);
  }
  return lines;
}
