/**
 * Format modules: VCF input, snpEff ANN annotations, DSV output
 */

export * from "./ann";
export * from "./dsv";
export * from "./vcf";
export { AbstractParser, type ResolvedParserOptions } from "./abstract-parser";
