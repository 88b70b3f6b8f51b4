/**
 * Projection to the published result columns
 *
 * @module operations/output
 */

import type { MutationCall, ResultRow, ResultTable } from "./types";
import { RESULT_COLUMNS } from "./types";

/**
 * A result table with the seven columns and no rows
 */
export function emptyResultTable(): ResultTable {
  return { columns: RESULT_COLUMNS, rows: [] };
}

/**
 * Rename and order mutation calls into the published schema
 */
export function formatResults(calls: readonly MutationCall[]): ResultTable {
  const rows = calls.map(
    (call): ResultRow => ({
      sample_id: call.sampleId,
      snpeff_gene_name: call.geneId,
      region: call.region,
      position: call.pos,
      mutation: call.hgvsP,
      ref_sequence: call.ref,
      sample_sequence: call.allele,
    })
  );
  return { columns: RESULT_COLUMNS, rows };
}
