import { decodeHTML } from "entities";

const TAG = /<[^>]+>/g;
const NBSP = /\u00a0/g;

/**
 * Plain text from a diagram label. Entities are decoded once, so "&amp;lt;"
 * stays the text "&lt;"; non-breaking spaces read as ordinary spaces.
 */
export function sanitize(raw: string | null | undefined): string {
  if (raw === undefined || raw === null) return "";
  return decodeHTML(raw).replace(NBSP, " ").replace(TAG, " ").trim();
}
