/**
 * DSV writer types
 */

/**
 * A single output cell; null and undefined are written as empty fields
 */
export type DSVCell = string | number | boolean | null | undefined;

export type DelimiterType = "," | "\t" | ";" | "|";

export interface DSVWriterOptions {
  /** Field delimiter (default: tab for `DSVWriter`, comma for `CSVWriter`) */
  delimiter?: DelimiterType;
  quote?: string;
  /** Emit the header row (default: true) */
  header?: boolean;
  lineEnding?: "\n" | "\r\n";
  quoteAll?: boolean;
  /** Quote values Excel would convert to dates or numbers */
  excelCompatible?: boolean;
  /** Force compression; otherwise chosen from the file extension */
  compression?: "gzip" | null;
  compressionLevel?: number;
}
