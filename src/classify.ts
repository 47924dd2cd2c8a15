import { applyDefaultValues } from "./mapping_store.js";
import { defaultRules, type Rules } from "./rules.js";
import {
  CATEGORIES,
  type Category,
  type Classification,
  type DiagramObject,
  type MappingTables,
} from "./util.js";

export const ROOT_KIND = "goal";

export function findRootGoal(objects: readonly DiagramObject[]): string | undefined {
  for (const o of objects) {
    if (o.kind === ROOT_KIND && o.rawLabel.trim() !== "") return o.rawLabel;
  }
  return undefined;
}

/**
 * Label of the first goal (document order) with non-blank text, or `fallback`
 * when no goal qualifies.
 */
export function selectRootLabel(objects: readonly DiagramObject[], fallback: string): string {
  return findRootGoal(objects) ?? fallback;
}

function matchCategory(text: string, table: MappingTables[Category], into: Set<string>): void {
  for (const [keyword, feature] of table) {
    if (text.includes(keyword)) into.add(feature);
  }
}

const sorted = (s: ReadonlySet<string>): string[] => Array.from(s).sort();

/**
 * Substring match of every keyword against every normalized label. Keywords
 * may span several words, so this is containment and not token equality.
 */
export function classify(
  objects: readonly DiagramObject[],
  tables: MappingTables,
  defaults: Rules["defaults"] = defaultRules.defaults,
): Classification {
  const found: Record<Category, Set<string>> = {
    algorithms: new Set(),
    nfrs: new Set(),
    backend: new Set(),
    integration: new Set(),
  };
  for (const o of objects) {
    for (const c of CATEGORIES) matchCategory(o.normalizedLabel, tables[c], found[c]);
  }
  const { backends, integrations } = applyDefaultValues(found.backend, found.integration, tables, defaults);
  return {
    algorithms: sorted(found.algorithms),
    nfrs: sorted(found.nfrs),
    backends: sorted(backends),
    integrations: sorted(integrations),
  };
}
