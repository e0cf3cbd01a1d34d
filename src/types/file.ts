/**
 * Outcome of reading a target file.
 *
 * "not_found" is a normal answer, not an error: it tells the changelog
 * composer this is the first entry. An existing empty file is
 * { kind: "found", text: "" }.
 */
export type ReadOutcome =
  | { readonly kind: "found"; readonly text: string }
  | { readonly kind: "not_found" };

export const NOT_FOUND: ReadOutcome = Object.freeze({ kind: "not_found" });

export function found(text: string): ReadOutcome {
  return { kind: "found", text };
}
