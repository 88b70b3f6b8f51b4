/**
 * @module formats/dsv/writer
 * @description Delimiter-separated output for result tables
 *
 * RFC 4180 quoting: a field is quoted when it contains the delimiter, the
 * quote character or a line break, and embedded quotes are doubled.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { writeString } from "../../io/file-writer";
import { DEFAULT_DELIMITERS, DEFAULT_QUOTE, LINE_ENDINGS } from "./constants";
import { protectFromExcel } from "./excel-protection";
import type { DSVCell, DSVWriterOptions } from "./types";
import { DSVWriterOptionsSchema } from "./validation";

/**
 * DSVWriter - CSV/TSV formatting and file output
 *
 * @example
 * ```typescript
 * const writer = new CSVWriter();
 * writer.formatTable(["a", "b"], [[1, "x,y"]]);
 * // 'a,b\n1,"x,y"\n'
 * ```
 */
export class DSVWriter {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly header: boolean;
  private readonly lineEnding: string;
  private readonly quoteAll: boolean;
  private readonly excelCompatible: boolean;
  private readonly compression: "gzip" | null;
  private readonly compressionLevel: number;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? DEFAULT_DELIMITERS.tsv;
    this.quote = options.quote ?? DEFAULT_QUOTE;
    this.header = options.header !== false;
    this.lineEnding = options.lineEnding ?? LINE_ENDINGS.unix;
    this.quoteAll = options.quoteAll ?? false;
    this.excelCompatible = options.excelCompatible ?? false;
    this.compression = options.compression ?? null;
    this.compressionLevel = options.compressionLevel ?? 6;
  }

  private formatField(value: DSVCell): string {
    if (value == null) return "";

    const field = String(value);

    if (this.excelCompatible) {
      const protectedField = protectFromExcel(field);
      if (protectedField !== field) {
        return protectedField;
      }
    }

    const needsQuoting =
      this.quoteAll ||
      field.includes(this.delimiter) ||
      field.includes(this.quote) ||
      field.includes("\n") ||
      field.includes("\r");

    if (!needsQuoting) {
      return field;
    }
    return this.quote + field.replaceAll(this.quote, this.quote + this.quote) + this.quote;
  }

  /**
   * Format one row of fields, without the line ending
   */
  formatRow(fields: readonly DSVCell[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format a whole table; every line, the last included, ends with the
   * line ending. The header is written even when there are no rows.
   */
  formatTable(columns: readonly string[], rows: readonly (readonly DSVCell[])[]): string {
    const lines: string[] = [];
    if (this.header) {
      lines.push(this.formatRow(columns));
    }
    for (const row of rows) {
      lines.push(this.formatRow(row));
    }
    return lines.map((line) => line + this.lineEnding).join("");
  }

  /**
   * Write a table to a file; `.gz` paths are gzip-compressed
   *
   * @throws {FileError} If the path cannot be written
   */
  async writeFile(
    path: string,
    columns: readonly string[],
    rows: readonly (readonly DSVCell[])[]
  ): Promise<void> {
    const content = this.formatTable(columns, rows);
    await writeString(path, content, {
      ...(this.compression && { compressionFormat: this.compression }),
      compressionLevel: this.compressionLevel,
    });
  }
}

/**
 * CSVWriter - comma-delimited output
 */
export class CSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.csv });
  }
}

/**
 * TSVWriter - tab-delimited output
 */
export class TSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
