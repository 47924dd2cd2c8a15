import { classify, findRootGoal } from "./classify.js";
import { MissingRootGoalError } from "./errors.js";
import { toIdentifier } from "./identifier.js";
import { parseIStar } from "./istar_parse.js";
import { loadAll } from "./mapping_store.js";
import { renderUvl } from "./render_uvl.js";
import { loadRules, type Rules } from "./rules.js";
import { readText, writeText, type Category, type Classification, type MappingTables } from "./util.js";

export const DEFAULT_CONFIG_DIR = "config";

export type GenerateOptions = {
  input: string;
  output: string;
  configDir?: string;
};

export type Conversion = {
  uvl: string;
  rootFeature: string;
  rootFromGoal: boolean;
  classification: Classification;
  objectCount: number;
};

export type GenerateResult = Conversion & {
  output: string;
  missingCategories: Category[];
};

/**
 * In-memory conversion of one diagram; no file access. Throws DiagramParseError
 * for unparseable XML and MissingRootGoalError when the rules demand a goal.
 */
export function convertIStar(xml: string, tables: MappingTables, rules: Rules, source = "<input>"): Conversion {
  const objects = parseIStar(xml, source, rules.diagram.element_tags);
  const goal = findRootGoal(objects);
  if (goal === undefined && rules.root.require_goal) throw new MissingRootGoalError(source);
  const rootFeature = toIdentifier(goal ?? rules.root.fallback);
  const classification = classify(objects, tables, rules.defaults);
  return {
    uvl: renderUvl(rootFeature, classification, rules.constraints.requires),
    rootFeature,
    rootFromGoal: goal !== undefined,
    classification,
    objectCount: objects.length,
  };
}

export function generateUvl(opts: GenerateOptions): GenerateResult {
  const configDir = opts.configDir ?? DEFAULT_CONFIG_DIR;
  const rules = loadRules(configDir);
  const { tables, missing } = loadAll(configDir);
  const conversion = convertIStar(readText(opts.input), tables, rules, opts.input);
  writeText(opts.output, conversion.uvl);
  return { ...conversion, output: opts.output, missingCategories: missing };
}
