/**
 * DSV writer constants
 */

/**
 * Delimiters by output flavour
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
} as const;

export const DEFAULT_QUOTE = '"';

/**
 * Values Excel silently turns into dates (SEPT1 → Sep-1, MARCH1 → Mar-1)
 */
export const EXCEL_GENE_PATTERNS = [
  /^(JAN|FEB|MAR|APR|MAY|JUN|JUL|AUG|SEP|SEPT|OCT|NOV|DEC)\d+$/i,
  /^(JANUARY|FEBRUARY|MARCH|APRIL|MAY|JUNE|JULY|AUGUST|SEPTEMBER|OCTOBER|NOVEMBER|DECEMBER)\d+$/i,
] as const;

export const LINE_ENDINGS = {
  unix: "\n",
  windows: "\r\n",
} as const;
