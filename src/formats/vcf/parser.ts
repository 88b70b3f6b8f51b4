/**
 * VCF table parser
 *
 * Reads a VCF document into an in-memory `VariantTable`. The column layout
 * is checked strictly: a missing `#CHROM` header, unexpected fixed columns,
 * ragged data lines and non-integer positions all raise `InputFormatError`
 * and no partial table is returned. Everything inside INFO and the sample
 * columns is kept verbatim for the annotation and genotype stages.
 *
 * @module vcf/parser
 */

import { type } from "arktype";
import { InputFormatError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import { AbstractParser } from "../abstract-parser";
import type { VariantRecord, VariantTable, VcfParserOptions } from "./types";
import { VCF_FIXED_COLUMNS, VCF_FORMAT_COLUMN } from "./types";

const VcfParserOptionsSchema = type({
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "signal?": "unknown",
  "onWarning?": "Function",
  "samples?": "string[]",
});

const POSITION_PATTERN = /^\d+$/;
const GT_FIRST = /^GT(:|$)/;

/**
 * Header layout resolved from the `#CHROM` line
 */
export interface VcfHeader {
  readonly columns: readonly string[];
  readonly samples: readonly string[];
  readonly hasFormat: boolean;
}

/**
 * Parse and validate the `#CHROM` header line
 *
 * @throws {InputFormatError} If the fixed columns are wrong or sample names repeat
 */
export function parseVcfHeader(line: string, lineNumber: number): VcfHeader {
  const columns = line.split("\t");

  for (const [index, expected] of VCF_FIXED_COLUMNS.entries()) {
    if (columns[index] !== expected) {
      throw new InputFormatError(
        `Expected column ${index + 1} to be '${expected}', got '${columns[index] ?? "<missing>"}'`,
        lineNumber,
        `Header: ${line}`,
        "#CHROM"
      );
    }
  }

  const extra = columns.slice(VCF_FIXED_COLUMNS.length);
  if (extra.length === 0) {
    return { columns, samples: [], hasFormat: false };
  }
  if (extra[0] !== VCF_FORMAT_COLUMN) {
    throw new InputFormatError(
      `Expected column 9 to be '${VCF_FORMAT_COLUMN}', got '${extra[0]}'`,
      lineNumber,
      "Sample columns must follow a FORMAT column",
      VCF_FORMAT_COLUMN
    );
  }

  const samples = extra.slice(1);
  const seen = new Set<string>();
  for (const sample of samples) {
    if (seen.has(sample)) {
      throw new InputFormatError(
        `Duplicate sample column '${sample}'`,
        lineNumber,
        `Header: ${line}`,
        "SAMPLE"
      );
    }
    seen.add(sample);
  }

  return { columns, samples, hasFormat: true };
}

/**
 * Parse one tab-separated data line against the header
 *
 * @throws {InputFormatError} On a column-count mismatch or a non-integer POS
 */
export function parseVcfRecord(
  line: string,
  header: VcfHeader,
  lineNumber: number,
  trackLineNumbers = true
): VariantRecord {
  const fields = line.split("\t");

  if (fields.length !== header.columns.length) {
    throw new InputFormatError(
      `Expected ${header.columns.length} tab-separated columns, got ${fields.length}`,
      lineNumber,
      `Line content: ${line.length > 200 ? `${line.slice(0, 200)}...` : line}`,
      "ROW"
    );
  }

  const [chrom = "", posStr = "", id = "", ref = "", alt = "", qual = "", filter = "", info = ""] =
    fields;

  if (!POSITION_PATTERN.test(posStr)) {
    throw new InputFormatError(
      `Invalid position '${posStr}' for ${chrom}`,
      lineNumber,
      "POS must be a non-negative integer",
      "POS"
    );
  }

  const genotypes = new Map<string, string>();
  header.samples.forEach((sample, index) => {
    genotypes.set(sample, fields[VCF_FIXED_COLUMNS.length + 1 + index] ?? "");
  });

  return {
    chrom,
    pos: Number.parseInt(posStr, 10),
    id,
    ref,
    alt,
    qual,
    filter,
    info,
    format: header.hasFormat ? (fields[VCF_FIXED_COLUMNS.length] ?? "") : null,
    genotypes,
    ...(trackLineNumbers && { lineNumber }),
  };
}

/**
 * VCF parser producing an in-memory variant table
 *
 * @example
 * ```typescript
 * const parser = new VcfParser();
 * const table = parser.parseString(vcfText);
 * console.log(table.samples, table.records.length);
 *
 * const fromDisk = await new VcfParser({ samples: ["S1"] }).parseFile("calls.ann.vcf.gz");
 * ```
 */
export class VcfParser extends AbstractParser<VariantTable, VcfParserOptions> {
  private readonly sampleFilter: readonly string[] | null;

  constructor(options: VcfParserOptions = {}) {
    const validationResult = VcfParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid VCF parser options: ${validationResult.summary}`);
    }

    super(options);
    this.sampleFilter = options.samples ?? null;
  }

  protected getFormatName(): string {
    return "VCF";
  }

  /**
   * Parse a complete VCF document
   *
   * @throws {InputFormatError} If the column layout is absent or broken
   */
  parseString(data: string): VariantTable {
    const lines = data.split(/\r?\n/);
    const meta: string[] = [];
    const records: VariantRecord[] = [];
    let header: VcfHeader | null = null;
    const warnedFormats = new Set<string>();

    for (const [index, line] of lines.entries()) {
      const lineNumber = index + 1;
      if (lineNumber % 10_000 === 0) {
        this.throwIfAborted(`parsing at line ${lineNumber}`);
      }
      if (line.length > this.options.maxLineLength) {
        throw new InputFormatError(
          `Line too long (${line.length} > ${this.options.maxLineLength})`,
          lineNumber
        );
      }
      if (line.trim() === "") continue;

      if (line.startsWith("##")) {
        meta.push(line);
        continue;
      }
      if (line.startsWith("#")) {
        if (header !== null) {
          throw new InputFormatError("Duplicate header line", lineNumber, undefined, "#CHROM");
        }
        header = parseVcfHeader(line, lineNumber);
        continue;
      }
      if (header === null) {
        throw new InputFormatError(
          "Data line found before the #CHROM header line",
          lineNumber,
          undefined,
          "#CHROM"
        );
      }

      const record = parseVcfRecord(line, header, lineNumber, this.options.trackLineNumbers);
      if (record.format !== null && !GT_FIRST.test(record.format) && !warnedFormats.has(record.format)) {
        warnedFormats.add(record.format);
        this.options.onWarning(
          `FORMAT '${record.format}' does not start with GT; genotype codes are read from the first sub-field`,
          lineNumber
        );
      }
      records.push(record);
    }

    if (header === null) {
      throw new InputFormatError("No #CHROM header line found", undefined, undefined, "#CHROM");
    }

    return this.selectSamples({ samples: header.samples, records, meta });
  }

  /**
   * Read and parse a VCF file; `.gz` and bgzip input are decompressed
   *
   * @throws {FileError} If the path is unreadable
   * @throws {InputFormatError} If the content is not a VCF table
   */
  async parseFile(filePath: string): Promise<VariantTable> {
    const text = await readToString(filePath);
    return this.parseString(text);
  }

  private selectSamples(table: VariantTable): VariantTable {
    if (this.sampleFilter === null) {
      return table;
    }

    const missing = this.sampleFilter.filter((sample) => !table.samples.includes(sample));
    if (missing.length > 0) {
      throw new ValidationError(
        `Requested samples not present in VCF: ${missing.join(", ")}`,
        undefined,
        `Available samples: ${table.samples.join(", ")}`
      );
    }

    const keep = this.sampleFilter;
    const records = table.records.map((record) => ({
      ...record,
      genotypes: new Map(
        keep.map((sample): [string, string] => [sample, record.genotypes.get(sample) ?? ""])
      ),
    }));
    return { ...table, samples: [...keep], records };
  }
}

/**
 * Read a VCF file (plain or gzip) into a variant table
 *
 * @throws {FileError} If the path is unreadable
 * @throws {InputFormatError} If the column layout is wrong
 *
 * @example
 * ```typescript
 * const table = await loadVariantTable("calls.ann.vcf.gz");
 * ```
 */
export async function loadVariantTable(
  filePath: string,
  options: VcfParserOptions = {}
): Promise<VariantTable> {
  return new VcfParser(options).parseFile(filePath);
}
