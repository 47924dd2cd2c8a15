import { defaultRules } from "./rules.js";
import type { Classification } from "./util.js";

const INDENT = "  ";

function pad(level: number): string {
  return INDENT.repeat(level);
}

function group(name: string, features: readonly string[]): string[] {
  if (features.length === 0) return [];
  return [`${pad(2)}${name} {`, ...features.map((f) => `${pad(3)}${f}`), `${pad(2)}}`];
}

/**
 * Feature tree under `features { Root { ... } }`. Algorithm, Backend and
 * IntegrationModel groups appear only when non-empty; NFRs hang directly off
 * the root. When `requires` is among the NFRs every algorithm gets a
 * `requires` constraint.
 */
export function renderUvl(
  rootFeature: string,
  c: Classification,
  requires: string = defaultRules.constraints.requires,
): string {
  const lines: string[] = ["features {", `${pad(1)}${rootFeature} {`];
  lines.push(...group("Algorithm", c.algorithms));
  lines.push(...group("Backend", c.backends));
  lines.push(...group("IntegrationModel", c.integrations));
  for (const n of c.nfrs) lines.push(`${pad(2)}${n}`);
  lines.push(`${pad(1)}}`, "}");
  if (c.algorithms.length > 0 && c.nfrs.includes(requires)) {
    lines.push("", "constraints {");
    for (const a of c.algorithms) lines.push(`${pad(1)}${a} requires ${requires}`);
    lines.push("}");
  }
  return `${lines.join("\n")}\n`;
}
