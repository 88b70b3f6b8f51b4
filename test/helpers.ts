/**
 * Shared VCF fixture builders
 */

export const DEFAULT_SAMPLES = ["S1", "S2"] as const;

interface AnnotationSpec {
  allele: string;
  effect?: string;
  geneId?: string;
  hgvsP?: string;
  extra?: string[];
}

/**
 * One snpEff ANN instance with all 15 sub-fields filled
 */
export function annEntry({
  allele,
  effect = "missense_variant",
  geneId = "CAB11_002014",
  hgvsP = "p.Ser643Pro",
  extra = [],
}: AnnotationSpec): string {
  return [
    allele,
    effect,
    "MODERATE",
    "FKS1",
    geneId,
    "transcript",
    "CAB11_002014-T1",
    "protein_coding",
    "1/1",
    "c.1927T>C",
    hgvsP,
    "1927/5694",
    "1927/5694",
    "643/1897",
    "",
    ...extra,
  ].join("|");
}

/**
 * INFO column carrying the given annotation instances
 */
export function annInfo(entries: string[]): string {
  return `DP=40;ANN=${entries.join(",")};LOF=(FKS1|CAB11_002014|1|1.00)`;
}

/**
 * One tab-separated data line with a GT:AD FORMAT column
 */
export function vcfLine(
  pos: number,
  ref: string,
  alt: string,
  info: string,
  genotypes: readonly string[],
  chrom = "chr1"
): string {
  return [chrom, String(pos), ".", ref, alt, "50", "PASS", info, "GT:AD", ...genotypes].join("\t");
}

/**
 * Header line for the given samples
 */
export function vcfHeader(samples: readonly string[] = DEFAULT_SAMPLES): string {
  return ["#CHROM", "POS", "ID", "REF", "ALT", "QUAL", "FILTER", "INFO", "FORMAT", ...samples].join(
    "\t"
  );
}

/**
 * A complete VCF document: one meta line, the header, then the data lines
 */
export function vcfText(lines: readonly string[], samples: readonly string[] = DEFAULT_SAMPLES): string {
  return `${["##fileformat=VCFv4.2", vcfHeader(samples), ...lines].join("\n")}\n`;
}
