import { describe, expect, it } from "vitest";
import { classify, findRootGoal, selectRootLabel } from "../src/classify.js";
import { toDiagramObject } from "../src/istar_parse.js";
import { parseMappingText } from "../src/mapping_store.js";
import { emptyTables } from "../src/util.js";

const task = (label: string) => toDiagramObject("task", label);
const goal = (label: string) => toDiagramObject("goal", label);

describe("selectRootLabel", () => {
  it("picks the first goal with text in document order", () => {
    const objects = [task("Run it"), goal("   "), goal("Drug Discovery"), goal("Other")];
    expect(selectRootLabel(objects, "Fallback")).toBe("Drug Discovery");
  });

  it("uses the fallback when no goal has text", () => {
    expect(selectRootLabel([task("Run it"), goal("")], "Protein Folding")).toBe("Protein Folding");
    expect(findRootGoal([task("Run it")])).toBeUndefined();
  });

  it("compares kinds after lower-casing", () => {
    expect(findRootGoal([toDiagramObject("GOAL", "Upper")])).toBe("Upper");
  });
});

describe("classify", () => {
  it("matches keywords as substrings of the normalized label", () => {
    const tables = { ...emptyTables(), algorithms: parseMappingText("rsa => RSA\naes => AES") };
    const result = classify([task("Uses AES encryption")], tables);
    expect(result.algorithms).toEqual(["AES"]);
  });

  it("matches multi-word keywords and keywords inside words", () => {
    const tables = {
      ...emptyTables(),
      algorithms: parseMappingText("monte carlo => MonteCarlo"),
      nfrs: parseMappingText("scalab => Scalability"),
    };
    const result = classify([task("Apply  MONTE   Carlo"), task("Highly scalable runs")], tables);
    expect(result.algorithms).toEqual(["MonteCarlo"]);
    expect(result.nfrs).toEqual(["Scalability"]);
  });

  it("deduplicates and sorts each category", () => {
    const tables = {
      ...emptyTables(),
      algorithms: parseMappingText("dft => DFT\ndensity functional => DFT\nhartree => HartreeFock"),
      backend: parseMappingText("gpu => GPU\ncloud => Cloud"),
    };
    const objects = [task("DFT on GPU"), task("Density functional theory in the cloud"), task("Hartree step on GPU")];
    const result = classify(objects, tables);
    expect(result.algorithms).toEqual(["DFT", "HartreeFock"]);
    expect(result.backends).toEqual(["Cloud", "GPU"]);
    expect(result.integrations).toEqual([]);
  });

  it("matches accented labels against plain keywords", () => {
    const tables = { ...emptyTables(), nfrs: parseMappingText("precisión => Precision") };
    expect(classify([task("Alta PRECISION")], tables).nfrs).toEqual(["Precision"]);
  });

  it("applies default features after scanning", () => {
    const tables = {
      ...emptyTables(),
      backend: parseMappingText("gpu => GPU\nhardware => Hardware"),
      integration: parseMappingText("middleware => Middleware"),
    };
    const result = classify([task("Nothing relevant")], tables);
    expect(result.backends).toEqual(["Hardware"]);
    expect(result.integrations).toEqual(["Middleware"]);
  });

  it("keeps other categories working when one table is empty", () => {
    const tables = {
      ...emptyTables(),
      algorithms: parseMappingText("monte carlo => MonteCarlo"),
      integration: parseMappingText("rest api => RestApi"),
    };
    const result = classify([task("Monte Carlo behind a REST API")], tables);
    expect(result).toEqual({
      algorithms: ["MonteCarlo"],
      nfrs: [],
      backends: [],
      integrations: ["RestApi"],
    });
  });
});
