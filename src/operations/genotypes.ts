/**
 * Per-sample genotype decoding over the annotated sites
 *
 * @module operations/genotypes
 */

import { decodeGenotype, resolveGenotype, splitAlternates } from "../formats/vcf/genotype";
import type { SampleCall, SiteRecord } from "./types";

/**
 * Decode every sample's call at every site
 *
 * Calls that cannot be decoded, or that point past the ALT list, resolve
 * to a null sequence. They are reported once per sample through
 * `onWarning` with a count, not once per site.
 *
 * @returns Calls in site order, then sample order
 */
export function decodeSampleCalls(
  sites: readonly SiteRecord[],
  samples: readonly string[],
  onWarning?: (message: string) => void
): SampleCall[] {
  const calls: SampleCall[] = [];
  const unparseable = new Map<string, number>();
  const outOfRange = new Map<string, number>();

  for (const site of sites) {
    const alternates = splitAlternates(site.alt);
    for (const sampleId of samples) {
      const call = decodeGenotype(site.genotypes.get(sampleId) ?? "");
      const sequence = resolveGenotype(call, site.ref, alternates);

      if (call.kind === "no-call" && call.reason === "unparseable") {
        unparseable.set(sampleId, (unparseable.get(sampleId) ?? 0) + 1);
      } else if (call.kind === "alternate" && sequence === null) {
        outOfRange.set(sampleId, (outOfRange.get(sampleId) ?? 0) + 1);
      }

      calls.push({ rowId: site.rowId, sampleId, call, sequence });
    }
  }

  if (onWarning) {
    for (const [sampleId, count] of unparseable) {
      onWarning(`Sample '${sampleId}': ${count} genotype(s) could not be decoded`);
    }
    for (const [sampleId, count] of outOfRange) {
      onWarning(`Sample '${sampleId}': ${count} allele index(es) beyond the ALT list`);
    }
  }

  return calls;
}
