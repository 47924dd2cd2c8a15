import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import { RulesError } from "./errors.js";
import { isRecord } from "./util.js";

export type Rules = {
  root: {
    fallback: string;
    require_goal: boolean;
  };
  diagram: {
    element_tags: string[];
  };
  defaults: {
    backend: string;
    integration: string;
  };
  constraints: {
    requires: string;
  };
};

export const RULES_FILE = "rules.yaml";

export const defaultRules: Rules = {
  root: { fallback: "", require_goal: false },
  diagram: { element_tags: ["object"] },
  defaults: { backend: "Hardware", integration: "Middleware" },
  constraints: { requires: "Precision" },
};

function asStr(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function asBool(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

function section(raw: unknown, key: string): Record<string, unknown> {
  if (!isRecord(raw)) return {};
  const v = raw[key];
  return isRecord(v) ? v : {};
}

export function mergeRules(raw: unknown): Rules {
  const root = section(raw, "root");
  const diagram = section(raw, "diagram");
  const defaults = section(raw, "defaults");
  const constraints = section(raw, "constraints");
  const tags = Array.isArray(diagram.element_tags)
    ? diagram.element_tags.filter((x): x is string => typeof x === "string" && x.trim().length > 0)
    : [];
  return {
    root: {
      fallback: asStr(root.fallback) ?? defaultRules.root.fallback,
      require_goal: asBool(root.require_goal) ?? defaultRules.root.require_goal,
    },
    diagram: {
      element_tags: tags.length > 0 ? tags : defaultRules.diagram.element_tags,
    },
    defaults: {
      backend: asStr(defaults.backend) ?? defaultRules.defaults.backend,
      integration: asStr(defaults.integration) ?? defaultRules.defaults.integration,
    },
    constraints: {
      requires: asStr(constraints.requires) ?? defaultRules.constraints.requires,
    },
  };
}

export function loadRules(configDir: string): Rules {
  const file = path.join(configDir, RULES_FILE);
  if (!fs.existsSync(file)) return mergeRules(undefined);
  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw new RulesError(file, e instanceof Error ? e.message : String(e));
  }
  return mergeRules(raw);
}
