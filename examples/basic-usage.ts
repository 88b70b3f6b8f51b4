/**
 * Basic usage: extract FKS1 hotspot mutations from an annotated VCF
 *
 * Usage: tsx examples/basic-usage.ts calls.ann.vcf.gz mutations.csv
 */

import {
  DEFAULT_REGIONS,
  extractMutationsFromFile,
  getErrorSuggestion,
  MutationCallError,
  writeResults,
} from "../src";

async function main(): Promise<void> {
  const [input, output = "mutations.csv"] = process.argv.slice(2);
  if (input === undefined) {
    console.error("Usage: basic-usage <input.vcf[.gz]> [output.csv|output.tsv]");
    process.exitCode = 1;
    return;
  }

  const table = await extractMutationsFromFile(input, {
    regions: DEFAULT_REGIONS,
    genes: ["CAB11_002014"],
    excludeEffects: "synonymous_variant",
  });

  for (const row of table.rows) {
    console.log(`${row.sample_id}\t${row.region}\t${row.position}\t${row.mutation}`);
  }
  await writeResults(output, table);
  console.log(`Wrote ${table.rows.length} row(s) to ${output}`);
}

main().catch((error: unknown) => {
  if (error instanceof MutationCallError) {
    console.error(error.toString());
    const suggestion = getErrorSuggestion(error);
    if (suggestion !== undefined) {
      console.error(`Suggestion: ${suggestion}`);
    }
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
