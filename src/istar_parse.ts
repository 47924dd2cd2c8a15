import fs from "fs";
import { pathToFileURL } from "url";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { DiagramParseError } from "./errors.js";
import { defaultRules } from "./rules.js";
import { normalize } from "./text_normalize.js";
import { sanitize } from "./text_sanitize.js";
import { asArray, isRecord, type DiagramObject } from "./util.js";

const ATTRS = ":@";
const TEXT = "#text";

function attr(attrs: Record<string, unknown>, name: string): string {
  const v = attrs[`@_${name}`];
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return "";
}

export function toDiagramObject(type: string, label: string): DiagramObject {
  const rawLabel = sanitize(label);
  return {
    kind: type.toLowerCase(),
    rawLabel,
    normalizedLabel: normalize(rawLabel),
  };
}

// preserveOrder output: every node is { [tag]: children[], ":@"?: attrs }.
function visit(nodes: unknown, tags: ReadonlySet<string>, out: DiagramObject[]): void {
  for (const n of asArray<unknown>(nodes)) {
    if (!isRecord(n)) continue;
    const rawAttrs = n[ATTRS];
    const attrs = isRecord(rawAttrs) ? rawAttrs : {};
    for (const [tag, children] of Object.entries(n)) {
      if (tag === ATTRS || tag === TEXT) continue;
      if (tags.has(tag)) out.push(toDiagramObject(attr(attrs, "type"), attr(attrs, "label")));
      visit(children, tags, out);
    }
  }
}

/**
 * Reads every diagram element (by default `<object>`) in document order.
 * Missing `type`/`label` attributes read as "". Text that is not well-formed
 * XML throws DiagramParseError.
 */
export function parseIStar(
  text: string,
  source = "<input>",
  elementTags: readonly string[] = defaultRules.diagram.element_tags,
): DiagramObject[] {
  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    throw new DiagramParseError(source, valid.err.msg, valid.err.line, valid.err.col);
  }
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    preserveOrder: true,
  });
  const doc: unknown = parser.parse(text);
  const out: DiagramObject[] = [];
  visit(doc, new Set(elementTags), out);
  return out;
}

export const PARSE_USAGE = "Usage: node dist/istar_parse.js <in.xml> [out.json]";

/** Dumps the parsed objects of one diagram as JSON; returns the exit code. */
export function runParse(args: readonly string[]): number {
  const [input, output = "-"] = args;
  if (!input) {
    console.error(PARSE_USAGE);
    return 1;
  }
  try {
    const objects = parseIStar(fs.readFileSync(input, "utf8"), input);
    const data = JSON.stringify(objects, null, 2);
    if (output === "-") {
      process.stdout.write(data);
    } else {
      fs.writeFileSync(output, data, "utf8");
    }
    console.error(`istar_parse: objects=${objects.length}`);
    return 0;
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    return 1;
  }
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  process.exit(runParse(process.argv.slice(2)));
}
