/**
 * DSV (CSV/TSV) result output
 */

export { DEFAULT_DELIMITERS, DEFAULT_QUOTE, EXCEL_GENE_PATTERNS, LINE_ENDINGS } from "./constants";
export { needsExcelProtection, protectFromExcel } from "./excel-protection";
export type { DSVCell, DSVWriterOptions, DelimiterType } from "./types";
export { DSVWriterOptionsSchema } from "./validation";
export { CSVWriter, DSVWriter, TSVWriter } from "./writer";
