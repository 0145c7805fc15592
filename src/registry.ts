// Named ISO-8601 and RFC 822 formatters, loaded from data/layouts.json.

import { readFileSync } from "node:fs";
import { z } from "zod";
import { compilePattern } from "./compiler.js";
import { Default } from "./defaults.js";
import { ConfigError } from "./error.js";
import { Formatter } from "./formatter.js";
import { choicePlan, restrictPlan } from "./plan.js";

export interface RegistryEntry {
  name: string;
  formatter: Formatter;
  canParse: boolean;
  canPrint: boolean;
}

const layoutSchema = z.object({
  name: z.string().min(1),
  /** more than one pattern parses whichever matches the most text */
  patterns: z.array(z.string().min(1)).min(1),
  print: z.boolean().default(true),
});

const catalogSchema = z.object({
  layouts: z.array(layoutSchema).min(1),
});

export type Layout = z.infer<typeof layoutSchema>;

function loadLayouts(): Layout[] {
  const path = new URL("../data/layouts.json", import.meta.url);
  return catalogSchema.parse(JSON.parse(readFileSync(path, "utf-8"))).layouts;
}

function buildEntry(layout: Layout): RegistryEntry {
  const plan = restrictPlan(choicePlan(layout.patterns.map(compilePattern)), {
    canPrint: layout.print,
  });
  const formatter = Formatter.fromPlan(plan, { zone: Default.zone });
  return {
    name: layout.name,
    formatter,
    canParse: formatter.canParse,
    canPrint: formatter.canPrint,
  };
}

function buildRegistry(layouts: Layout[]): ReadonlyMap<string, RegistryEntry> {
  const entries = layouts
    .map(buildEntry)
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const map = new Map<string, RegistryEntry>();
  for (const entry of entries) {
    if (map.has(entry.name)) {
      throw new ConfigError(`duplicate built-in layout '${entry.name}'`);
    }
    map.set(entry.name, Object.freeze(entry));
  }
  return map;
}

/** Every built-in entry, keyed and ordered by name. */
export const registry: ReadonlyMap<string, RegistryEntry> = buildRegistry(loadLayouts());

/** Built-in formatters by name. */
export const formatters: ReadonlyMap<string, Formatter> = new Map(
  [...registry].map(([name, entry]) => [name, entry.formatter]),
);

/** Names of parse-capable entries, in name order. */
export const parsers: readonly string[] = Object.freeze(
  [...registry.values()].filter((e) => e.canParse).map((e) => e.name),
);

/** Names of print-capable entries, in name order. */
export const printers: readonly string[] = Object.freeze(
  [...registry.values()].filter((e) => e.canPrint).map((e) => e.name),
);

/** Look up a built-in formatter by name. */
export function getFormatter(name: string): Formatter {
  const entry = registry.get(name);
  if (entry === undefined) throw new ConfigError(`no built-in formatter named '${name}'`);
  return entry.formatter;
}

/** Names and capabilities of every built-in entry, in name order. */
export function listRegistry(): { name: string; canParse: boolean; canPrint: boolean }[] {
  return [...registry.values()].map(({ name, canParse, canPrint }) => ({
    name,
    canParse,
    canPrint,
  }));
}
