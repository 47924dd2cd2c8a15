import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RulesError } from "../src/errors.js";
import { RULES_FILE, defaultRules, loadRules, mergeRules } from "../src/rules.js";

describe("mergeRules", () => {
  it("returns the defaults for anything that is not a mapping", () => {
    expect(mergeRules(undefined)).toEqual(defaultRules);
    expect(mergeRules("text")).toEqual(defaultRules);
    expect(mergeRules([1, 2])).toEqual(defaultRules);
  });

  it("overrides field by field", () => {
    const rules = mergeRules({ root: { fallback: "Protein Folding" }, defaults: { integration: "Bus" } });
    expect(rules.root).toEqual({ fallback: "Protein Folding", require_goal: false });
    expect(rules.defaults).toEqual({ backend: "Hardware", integration: "Bus" });
    expect(rules.constraints.requires).toBe("Precision");
  });

  it("ignores ill-typed values", () => {
    const rules = mergeRules({
      root: { fallback: 42, require_goal: "yes" },
      diagram: { element_tags: [1, "", "UserObject"] },
      constraints: "Precision",
    });
    expect(rules.root).toEqual(defaultRules.root);
    expect(rules.diagram.element_tags).toEqual(["UserObject"]);
    expect(rules.constraints).toEqual(defaultRules.constraints);
  });
});

describe("loadRules", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "istar-uvl-rules-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("uses the defaults without a rules file", () => {
    expect(loadRules(dir)).toEqual(defaultRules);
  });

  it("reads YAML overrides", () => {
    writeFileSync(join(dir, RULES_FILE), "root:\n  require_goal: true\ndiagram:\n  element_tags: [object, UserObject]\n", "utf8");
    const rules = loadRules(dir);
    expect(rules.root.require_goal).toBe(true);
    expect(rules.diagram.element_tags).toEqual(["object", "UserObject"]);
  });

  it("rejects a file that is not YAML", () => {
    writeFileSync(join(dir, RULES_FILE), "root: [unclosed\n", "utf8");
    expect(() => loadRules(dir)).toThrow(RulesError);
  });
});
