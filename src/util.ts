import fs from "fs";

export type DiagramObject = {
  kind: string;
  rawLabel: string;
  normalizedLabel: string;
};

export const CATEGORIES = ["algorithms", "nfrs", "backend", "integration"] as const;

export type Category = (typeof CATEGORIES)[number];

export type MappingTable = ReadonlyMap<string, string>;

export type MappingTables = Readonly<Record<Category, MappingTable>>;

export type Classification = {
  algorithms: string[];
  nfrs: string[];
  backends: string[];
  integrations: string[];
};

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function asArray<T>(v: T | T[] | undefined | null): T[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function emptyTables(): Record<Category, MappingTable> {
  return {
    algorithms: new Map(),
    nfrs: new Map(),
    backend: new Map(),
    integration: new Map(),
  };
}
