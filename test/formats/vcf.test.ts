/**
 * VCF parser tests: table layout, strict column checks, sample selection
 */

import { describe, expect, test, vi } from "vitest";
import {
  ERROR_SUGGESTIONS,
  getErrorSuggestion,
  InputFormatError,
  ParseError,
  ValidationError,
} from "../../src/errors";
import {
  detectVcfFormat,
  formatLocus,
  getInfoValue,
  parseVcfHeader,
  VcfParser,
} from "../../src/formats/vcf";
import { vcfHeader, vcfLine, vcfText } from "../helpers";

describe("VcfParser", () => {
  test("parses samples, records and meta lines", () => {
    const text = vcfText([
      vcfLine(221640, "AGT", "AGC", "DP=40", ["1:0,35", "0:30,0"]),
      vcfLine(223790, "C", "T,G", "DP=12", [".", "2:0,0,9"], "chr2"),
    ]);

    const table = new VcfParser().parseString(text);

    expect(table.samples).toEqual(["S1", "S2"]);
    expect(table.meta).toEqual(["##fileformat=VCFv4.2"]);
    expect(table.records).toHaveLength(2);

    const [first, second] = table.records;
    expect(first?.chrom).toBe("chr1");
    expect(first?.pos).toBe(221640);
    expect(first?.ref).toBe("AGT");
    expect(first?.alt).toBe("AGC");
    expect(first?.info).toBe("DP=40");
    expect(first?.format).toBe("GT:AD");
    expect(first?.genotypes.get("S1")).toBe("1:0,35");
    expect(first?.genotypes.get("S2")).toBe("0:30,0");
    expect(first?.lineNumber).toBe(3);

    expect(second?.chrom).toBe("chr2");
    expect(second?.alt).toBe("T,G");
    expect(second?.genotypes.get("S1")).toBe(".");
  });

  test("accepts CRLF line endings and skips blank lines", () => {
    const text = ["##fileformat=VCFv4.2", vcfHeader(), "", vcfLine(5, "A", "G", "DP=1", ["1", "0"])].join(
      "\r\n"
    );

    const table = new VcfParser().parseString(text);

    expect(table.records).toHaveLength(1);
    expect(table.records[0]?.genotypes.get("S2")).toBe("0");
  });

  test("omits line numbers when tracking is disabled", () => {
    const table = new VcfParser({ trackLineNumbers: false }).parseString(
      vcfText([vcfLine(5, "A", "G", "DP=1", ["1", "0"])])
    );

    expect(table.records[0]?.lineNumber).toBeUndefined();
  });

  test("parses a sites-only file without FORMAT", () => {
    const header = ["#CHROM", "POS", "ID", "REF", "ALT", "QUAL", "FILTER", "INFO"].join("\t");
    const line = ["chr1", "10", ".", "A", "T", ".", ".", "DP=3"].join("\t");

    const table = new VcfParser().parseString(`${header}\n${line}\n`);

    expect(table.samples).toEqual([]);
    expect(table.records[0]?.format).toBeNull();
    expect(table.records[0]?.genotypes.size).toBe(0);
  });

  test("warns once per FORMAT layout that does not lead with GT", () => {
    const onWarning = vi.fn();
    const line = vcfLine(5, "A", "G", "DP=1", ["35:1", "30:0"]).replace("GT:AD", "AD:GT");

    new VcfParser({ onWarning }).parseString(vcfText([line, line.replace("\t5\t", "\t6\t")]));

    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith(
      "FORMAT 'AD:GT' does not start with GT; genotype codes are read from the first sub-field",
      3
    );
  });

  describe("structural errors", () => {
    test("rejects input without a #CHROM header", () => {
      const parser = new VcfParser();

      expect(() => parser.parseString("##fileformat=VCFv4.2\n")).toThrow(InputFormatError);
      try {
        parser.parseString("##fileformat=VCFv4.2\n");
      } catch (error) {
        expect(error).toBeInstanceOf(InputFormatError);
        if (error instanceof InputFormatError) {
          expect(error.column).toBe("#CHROM");
          expect(error.format).toBe("VCF");
        }
      }
    });

    test("rejects a data line before the header", () => {
      const text = `${vcfLine(5, "A", "G", "DP=1", ["1", "0"])}\n${vcfHeader()}\n`;
      expect(() => new VcfParser().parseString(text)).toThrow("before the #CHROM header");
    });

    test("rejects a row with the wrong column count", () => {
      const text = vcfText([vcfLine(5, "A", "G", "DP=1", ["1"])]);

      try {
        new VcfParser().parseString(text);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InputFormatError);
        if (error instanceof InputFormatError) {
          expect(error.lineNumber).toBe(3);
          expect(error.column).toBe("ROW");
          expect(error.message).toBe("Expected 11 tab-separated columns, got 10");
        }
      }
    });

    test("rejects a non-integer position", () => {
      const line = vcfLine(5, "A", "G", "DP=1", ["1", "0"]).replace("\t5\t", "\t5a\t");

      try {
        new VcfParser().parseString(vcfText([line]));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InputFormatError);
        if (error instanceof InputFormatError) {
          expect(error.column).toBe("POS");
          expect(error.message).toBe("Invalid position '5a' for chr1");
        }
      }
    });

    test("rejects wrong fixed columns", () => {
      expect(() => parseVcfHeader("#CHROM\tPOS\tREF\tID", 1)).toThrow(
        "Expected column 3 to be 'ID', got 'REF'"
      );
    });

    test("rejects sample columns without FORMAT", () => {
      expect(() => parseVcfHeader("#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tS1", 1)).toThrow(
        InputFormatError
      );
    });

    test("rejects duplicate sample names", () => {
      expect(() => parseVcfHeader(vcfHeader(["S1", "S1"]), 1)).toThrow("Duplicate sample column 'S1'");
    });

    test("suggestions match the failing header check", () => {
      const suggestionFor = (line: string): string | undefined => {
        try {
          parseVcfHeader(line, 1);
        } catch (error) {
          if (error instanceof InputFormatError) return getErrorSuggestion(error);
          throw error;
        }
        return undefined;
      };

      expect(suggestionFor(vcfHeader(["S1", "S1"]))).toBe(ERROR_SUGGESTIONS.DUPLICATE_SAMPLE);
      expect(suggestionFor("#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tS1")).toBe(
        ERROR_SUGGESTIONS.FORMAT_COLUMN
      );
    });

    test("accepts position 0 and describes POS as non-negative", () => {
      const zero = vcfLine(0, "A", "G", "DP=1", ["1", "0"]);
      const negative = zero.replace("\t0\t", "\t-1\t");

      expect(new VcfParser().parseString(vcfText([zero])).records[0]?.pos).toBe(0);
      try {
        new VcfParser().parseString(vcfText([negative]));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InputFormatError);
        if (error instanceof InputFormatError) {
          expect(error.message).toBe("Invalid position '-1' for chr1");
          expect(error.context).toBe("POS must be a non-negative integer");
        }
      }
    });

    test("rejects a second header line", () => {
      const text = `${vcfHeader()}\n${vcfHeader()}\n`;
      expect(() => new VcfParser().parseString(text)).toThrow("Duplicate header line");
    });

    test("rejects lines longer than maxLineLength", () => {
      const parser = new VcfParser({ maxLineLength: 20 });
      expect(() => parser.parseString(vcfText([]))).toThrow(InputFormatError);
    });
  });

  describe("sample selection", () => {
    const text = vcfText([vcfLine(5, "A", "G", "DP=1", ["1", "0"])]);

    test("keeps only the requested samples, in the requested order", () => {
      const table = new VcfParser({ samples: ["S2"] }).parseString(text);

      expect(table.samples).toEqual(["S2"]);
      expect([...(table.records[0]?.genotypes.keys() ?? [])]).toEqual(["S2"]);
    });

    test("rejects unknown samples", () => {
      expect(() => new VcfParser({ samples: ["S9"] }).parseString(text)).toThrow(ValidationError);
    });
  });

  test("rejects invalid options", () => {
    expect(() => new VcfParser({ maxLineLength: -1 })).toThrow(ValidationError);
  });

  test("stops when the signal is aborted", () => {
    const controller = new AbortController();
    controller.abort();
    const text = `${Array.from({ length: 10_000 }, () => "##meta=x").join("\n")}\n${vcfHeader()}\n`;

    expect(() => new VcfParser({ signal: controller.signal }).parseString(text)).toThrow(ParseError);
  });
});

describe("VCF utilities", () => {
  test("getInfoValue reads keys and flags", () => {
    const info = "DP=40;SOMATIC;ANN=A|x";

    expect(getInfoValue(info, "DP")).toBe("40");
    expect(getInfoValue(info, "SOMATIC")).toBe("");
    expect(getInfoValue(info, "ANN")).toBe("A|x");
    expect(getInfoValue(info, "AF")).toBeUndefined();
  });

  test("detectVcfFormat recognises meta and header lines", () => {
    expect(detectVcfFormat("##fileformat=VCFv4.2\n")).toBe(true);
    expect(detectVcfFormat(`${vcfHeader()}\n`)).toBe(true);
    expect(detectVcfFormat(">seq1\nACGT\n")).toBe(false);
  });

  test("formatLocus", () => {
    const table = new VcfParser().parseString(vcfText([vcfLine(221640, "AGT", "AGC", "DP=1", ["1", "0"])]));
    const record = table.records[0];

    expect(record && formatLocus(record)).toBe("chr1:221640 AGT>AGC");
  });
});
