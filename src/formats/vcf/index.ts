/**
 * VCF (Variant Call Format) module exports
 *
 * @example
 * ```typescript
 * import { VcfParser } from "./formats/vcf";
 *
 * const table = new VcfParser().parseString(vcfText);
 * for (const record of table.records) {
 *   console.log(`${record.chrom}:${record.pos}`);
 * }
 * ```
 *
 * @module vcf
 */

export {
  loadVariantTable,
  parseVcfHeader,
  parseVcfRecord,
  type VcfHeader,
  VcfParser,
} from "./parser";
export {
  decodeGenotype,
  type GenotypeCall,
  genotypeToken,
  resolveGenotype,
  splitAlternates,
} from "./genotype";
export type { VariantRecord, VariantTable, VcfParserOptions } from "./types";
export { VCF_FIXED_COLUMNS, VCF_FORMAT_COLUMN } from "./types";
export { detectVcfFormat, formatLocus, getInfoValue } from "./utils";
