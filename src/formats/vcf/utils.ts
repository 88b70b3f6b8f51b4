/**
 * VCF utility functions
 *
 * @module vcf/utils
 */

import type { VariantRecord } from "./types";

/**
 * Quick check whether text looks like a VCF document
 */
export function detectVcfFormat(data: string): boolean {
  const head = data.trimStart().slice(0, 4096);
  return head.startsWith("##fileformat=VCF") || /^#CHROM\tPOS\tID\tREF\tALT/m.test(head);
}

/**
 * Read one key from an INFO field (`KEY=value;FLAG;...`)
 *
 * @returns The value, `""` for a flag, or undefined when the key is absent
 */
export function getInfoValue(info: string, key: string): string | undefined {
  for (const entry of info.split(";")) {
    const eq = entry.indexOf("=");
    const entryKey = eq === -1 ? entry : entry.slice(0, eq);
    if (entryKey === key) {
      return eq === -1 ? "" : entry.slice(eq + 1);
    }
  }
  return undefined;
}

/**
 * Human-readable locus for messages, e.g. `chr1:221640 AGT>AGC`
 */
export function formatLocus(record: VariantRecord): string {
  return `${record.chrom}:${record.pos} ${record.ref}>${record.alt}`;
}
