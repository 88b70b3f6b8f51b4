/**
 * Genotype decoding
 *
 * A sample's genotype field is reduced to the allele code before the first
 * `.`, `|` or `:` (haploid calls such as `1:35,2` or `0|1` phased pairs keep
 * their first allele). The code is decoded into a tagged call first and only
 * then resolved against the site's `[REF, ...ALT]` list, so a missing call
 * can never be mistaken for an index.
 *
 * @module vcf/genotype
 */

/**
 * Decoded genotype call
 *
 * `alternate.index` is 1-based over the ALT list, as in the GT field.
 */
export type GenotypeCall =
  | { readonly kind: "no-call"; readonly reason: "missing" | "unparseable" }
  | { readonly kind: "reference" }
  | { readonly kind: "alternate"; readonly index: number };

const GENOTYPE_DELIMITERS = /^[^.|:]*/;
const ALLELE_CODE = /^\d+$/;

/**
 * Extract the allele code token from a raw genotype field
 *
 * @example
 * ```typescript
 * genotypeToken("1:35,2"); // "1"
 * genotypeToken(".");      // ""
 * ```
 */
export function genotypeToken(raw: string): string {
  return GENOTYPE_DELIMITERS.exec(raw)?.[0] ?? "";
}

/**
 * Decode a raw genotype field into a call
 *
 * Empty tokens are missing calls; anything that is not a non-negative
 * integer (`0/1`, `-1`, `A`) is an unparseable no-call.
 */
export function decodeGenotype(raw: string): GenotypeCall {
  const token = genotypeToken(raw.trim());

  if (token === "") {
    return { kind: "no-call", reason: "missing" };
  }
  if (!ALLELE_CODE.test(token)) {
    return { kind: "no-call", reason: "unparseable" };
  }

  const code = Number.parseInt(token, 10);
  return code === 0 ? { kind: "reference" } : { kind: "alternate", index: code };
}

/**
 * Split a comma-delimited ALT field; `.` means no alternates
 */
export function splitAlternates(alt: string): string[] {
  if (alt === "" || alt === ".") {
    return [];
  }
  return alt.split(",");
}

/**
 * Resolve a call to the nucleotide sequence the sample carries
 *
 * @returns The allele sequence, or null for no-calls and codes beyond the ALT list
 */
export function resolveGenotype(
  call: GenotypeCall,
  ref: string,
  alternates: readonly string[]
): string | null {
  switch (call.kind) {
    case "no-call":
      return null;
    case "reference":
      return ref;
    case "alternate":
      return alternates[call.index - 1] ?? null;
  }
}
