/**
 * Annotation splitting (row identity) and sub-field parsing
 */

import { describe, expect, test } from "vitest";
import { VcfParser } from "../../src/formats/vcf";
import {
  buildRegionIndex,
  filterByRegions,
  parseAnnotationFields,
  splitAnnotations,
} from "../../src/operations";
import { annEntry, annInfo, vcfLine, vcfText } from "../helpers";

function regionRecords(lines: string[]) {
  const table = new VcfParser().parseString(vcfText(lines));
  return filterByRegions(table.records, buildRegionIndex({ r: [100, 101, 102] }));
}

describe("splitAnnotations", () => {
  const records = regionRecords([
    vcfLine(100, "AGT", "AGC,AAT", "DP=5;ANN=AGC|e1,AAT|e2", ["1", "2"]),
    vcfLine(101, "C", "T", "DP=5", ["1", "0"]),
    vcfLine(102, "G", "A", "ANN=A|e3", ["0", "1"]),
  ]);

  test("numbers only the annotated sites, in input order", () => {
    const { sites } = splitAnnotations(records);

    expect(sites.map((site) => [site.rowId, site.pos])).toEqual([
      [1, 100],
      [2, 102],
    ]);
    expect(sites[0]?.region).toBe("r");
  });

  test("emits one instance per comma-separated annotation", () => {
    const { instances } = splitAnnotations(records);

    expect(instances).toEqual([
      { rowId: 1, chrom: "chr1", pos: 100, ref: "AGT", alt: "AGC,AAT", index: 1, raw: "AGC|e1" },
      { rowId: 1, chrom: "chr1", pos: 100, ref: "AGT", alt: "AGC,AAT", index: 2, raw: "AAT|e2" },
      { rowId: 2, chrom: "chr1", pos: 102, ref: "G", alt: "A", index: 1, raw: "A|e3" },
    ]);
  });

  test("stops the payload at the next INFO key", () => {
    const { instances } = splitAnnotations(
      regionRecords([vcfLine(100, "AGT", "AGC", annInfo([annEntry({ allele: "AGC" })]), ["1", "0"])])
    );

    expect(instances).toHaveLength(1);
    expect(instances[0]?.raw).toBe(annEntry({ allele: "AGC" }));
  });

  test("returns nothing for records without annotations", () => {
    expect(splitAnnotations(regionRecords([vcfLine(101, "C", "T", "DP=5", ["1", "0"])]))).toEqual({
      sites: [],
      instances: [],
    });
  });
});

describe("parseAnnotationFields", () => {
  test("replaces the raw string with parsed fields, keeping the join key", () => {
    const { instances } = splitAnnotations(
      regionRecords([vcfLine(100, "AGT", "AGC", "ANN=AGC|missense_variant|MODERATE", ["1", "0"])])
    );

    const [parsed] = parseAnnotationFields(instances);

    expect(parsed?.rowId).toBe(1);
    expect(parsed?.index).toBe(1);
    expect(parsed?.entry.allele).toBe("AGC");
    expect(parsed?.entry.putativeImpact).toBe("MODERATE");
    expect(parsed?.entry.geneId).toBeNull();
    expect(parsed && "raw" in parsed).toBe(false);
  });
});
