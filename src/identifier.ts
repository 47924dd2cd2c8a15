export const FALLBACK_IDENTIFIER = "RootGoal";

const WORD = /^[\p{L}\p{N}]+$/u;

function capitalize(word: string): string {
  const [first = "", ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join("").toLowerCase();
}

/**
 * PascalCase feature name from free text: "protein folding" -> "ProteinFolding".
 * Anything that is not a letter, digit, space or underscore separates words.
 */
export function toIdentifier(text: string | null | undefined): string {
  if (!text) return FALLBACK_IDENTIFIER;
  const words = text
    .replace(/[^\p{L}\p{N} _]/gu, " ")
    .replace(/_/g, " ")
    .split(/\s+/)
    .filter((w) => WORD.test(w));
  if (words.length === 0) return FALLBACK_IDENTIFIER;
  return words.map(capitalize).join("");
}
