/**
 * File reading with gzip detection
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync, strToU8 } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { exists, getSize, readBytes, readToString } from "../../src/io/file-reader";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "snpeff-mutations-read-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("readToString", () => {
  test("reads plain text", async () => {
    const path = join(dir, "calls.vcf");
    writeFileSync(path, "##fileformat=VCFv4.2\n");

    expect(await readToString(path)).toBe("##fileformat=VCFv4.2\n");
  });

  test("decompresses gzip input", async () => {
    const path = join(dir, "calls.vcf.gz");
    writeFileSync(path, gzipSync(strToU8("##fileformat=VCFv4.2\n")));

    expect(await readToString(path)).toBe("##fileformat=VCFv4.2\n");
  });

  test("reads concatenated gzip members as one stream", async () => {
    const path = join(dir, "calls.vcf.bgz");
    const first = gzipSync(strToU8("first\n"));
    const second = gzipSync(strToU8("second\n"));
    writeFileSync(path, Buffer.concat([first, second]));

    expect(await readToString(path)).toBe("first\nsecond\n");
  });

  test("reads a .gz file that is not compressed as plain text", async () => {
    const path = join(dir, "already-decompressed.vcf.gz");
    writeFileSync(path, "plain\n");

    expect(await readToString(path)).toBe("plain\n");
  });

  test("returns raw bytes when decompression is disabled", async () => {
    const path = join(dir, "calls.vcf.gz");
    writeFileSync(path, gzipSync(strToU8("x")));

    const bytes = await readBytes(path, { autoDecompress: false });

    expect(bytes[0]).toBe(0x1f);
    expect(bytes[1]).toBe(0x8b);
  });

  test("fails with FileError for a missing file", async () => {
    const path = join(dir, "missing.vcf");

    await expect(readToString(path)).rejects.toBeInstanceOf(FileError);
    await expect(readToString(path)).rejects.toMatchObject({ operation: "stat", filePath: path });
  });

  test("enforces maxFileSize", async () => {
    const path = join(dir, "big.vcf");
    writeFileSync(path, "x".repeat(100));

    await expect(readBytes(path, { maxFileSize: 10 })).rejects.toThrow(
      "File too large: 100 bytes exceeds limit of 10 bytes"
    );
  });

  test("rejects an empty path", async () => {
    await expect(readToString("")).rejects.toBeInstanceOf(FileError);
  });
});

describe("exists / getSize", () => {
  test("report regular files only", async () => {
    const path = join(dir, "calls.vcf");
    writeFileSync(path, "12345");

    expect(await exists(path)).toBe(true);
    expect(await exists(join(dir, "nope.vcf"))).toBe(false);
    expect(await exists(dir)).toBe(false);
    expect(await getSize(path)).toBe(5);
  });
});
