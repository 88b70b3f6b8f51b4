/**
 * Excel protection for identifiers in result tables
 *
 * Sample IDs and gene names are the fields at risk: Excel reads `SEPT1` as
 * a date, strips the zeros from `0042` and evaluates `=...` as a formula.
 */

import { EXCEL_GENE_PATTERNS } from "./constants";

/**
 * Whether Excel would rewrite the field on import
 */
export function needsExcelProtection(field: string): boolean {
  if (EXCEL_GENE_PATTERNS.some((pattern) => pattern.test(field))) {
    return true;
  }
  // leading zeros, long digit runs (scientific notation), formulas
  return /^0+[0-9A-Za-z]/.test(field) || /^\d{16,}$/.test(field) || /^[=+\-@]/.test(field);
}

/**
 * Quote a field when Excel would otherwise rewrite it
 *
 * @example
 * ```typescript
 * protectFromExcel("SEPT1");  // '"SEPT1"'
 * protectFromExcel("S1");     // "S1"
 * ```
 */
export function protectFromExcel(field: string): string {
  return needsExcelProtection(field) ? `"${field}"` : field;
}
