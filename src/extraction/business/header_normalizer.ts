/**
 * Column header normalization for extracted report CSVs.
 *
 * Literal substitutions run in order and each replaces every occurrence, so
 * later rules see the output of earlier ones: removing "|" turns
 * "New Jersey | Miami" into "New Jersey  Miami" before the location rules run.
 */
const SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  [":", ""],
  [" - ", "_"],
  ["|", ""],
  ["?", ""],
  ["/", "_"],
  ["-", "_"],
  ["Screening Question Answer", ""],
  ["National", "kf"],
  ["New Jersey  Miami", "taf"],
  ["New Jersey, Miami", "taf"],
  ["New Jersey", "nj"],
  ["Miami", "mia"],
];

export function normalizeHeader(label: string): string {
  let value = label;
  for (const [search, replacement] of SUBSTITUTIONS) {
    value = value.split(search).join(replacement);
  }
  return value.trim().replace(/ /g, "_").replace(/_{2,}/g, "_").toLowerCase();
}

export function normalizeHeaders(labels: readonly string[]): string[] {
  return labels.map(normalizeHeader);
}
