import path from "path";
import { normalize } from "./text_normalize.js";
import type { Rules } from "./rules.js";
import { CATEGORIES, emptyTables, readText, type Category, type MappingTable, type MappingTables } from "./util.js";

export type LoadedTables = {
  tables: MappingTables;
  missing: Category[];
};

const DELIMITER = "=>";

/**
 * Parses `keyword => Feature` lines. Keys go through the same normalize() as
 * diagram labels; features are kept verbatim. Blank, `#` and undelimited lines
 * are skipped, and so are lines with an empty key or feature.
 */
export function parseMappingText(text: string): MappingTable {
  const table = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const at = trimmed.indexOf(DELIMITER);
    if (at < 0) continue;
    const key = normalize(trimmed.slice(0, at));
    const feature = trimmed.slice(at + DELIMITER.length).trim();
    if (!key || !feature) continue;
    table.set(key, feature);
  }
  return table;
}

export function categoryPath(configDir: string, category: Category): string {
  return path.join(configDir, `${category}.txt`);
}

export function loadCategory(file: string): MappingTable | undefined {
  let text: string;
  try {
    text = readText(file);
  } catch {
    return undefined;
  }
  return parseMappingText(text);
}

export function loadAll(configDir: string): LoadedTables {
  const tables = emptyTables();
  const missing: Category[] = [];
  for (const c of CATEGORIES) {
    const table = loadCategory(categoryPath(configDir, c));
    if (table) tables[c] = table;
    else missing.push(c);
  }
  return { tables, missing };
}

function declares(table: MappingTable, feature: string): boolean {
  for (const v of table.values()) {
    if (v === feature) return true;
  }
  return false;
}

/**
 * Fills an empty backend/integration detection with the category's generic
 * feature, but only when that table can itself produce the feature.
 */
export function applyDefaultValues(
  backends: ReadonlySet<string>,
  integrations: ReadonlySet<string>,
  tables: MappingTables,
  defaults: Rules["defaults"],
): { backends: Set<string>; integrations: Set<string> } {
  const b = new Set(backends);
  const i = new Set(integrations);
  if (b.size === 0 && declares(tables.backend, defaults.backend)) b.add(defaults.backend);
  if (i.size === 0 && declares(tables.integration, defaults.integration)) i.add(defaults.integration);
  return { backends: b, integrations: i };
}
