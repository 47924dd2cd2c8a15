/**
 * Matching key for a label: lower-cased, diacritics dropped (NFD then every
 * nonspacing mark removed), whitespace runs collapsed to one space.
 * Never used for display.
 */
export function normalize(text: string | null | undefined): string {
  if (text === undefined || text === null) return "";
  const base = text.trim().toLowerCase().normalize("NFD").replace(/\p{Mn}/gu, "");
  return base.split(/\s+/).filter((w) => w.length > 0).join(" ");
}
