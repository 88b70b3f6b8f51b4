/**
 * Join & reshape: decoded sample calls × parsed annotations
 *
 * @module operations/reshape
 */

import type {
  AnnotationFilter,
  MutationCall,
  ParsedAnnotation,
  SampleCall,
  SiteRecord,
} from "./types";

/**
 * Annotation-level filters, ANDed: a protein change is present, the effect
 * is not excluded and the gene is one of interest
 */
export function passesAnnotationFilter(
  annotation: ParsedAnnotation,
  filter: AnnotationFilter
): boolean {
  const { hgvsP, effect, geneId } = annotation.entry;

  if (hgvsP === null || hgvsP === "") {
    return false;
  }
  if (filter.excludeEffects !== null && effect !== null && filter.excludeEffects.test(effect)) {
    return false;
  }
  return geneId !== null && filter.genes.has(geneId);
}

/**
 * Join calls to annotations on `rowId` and keep the samples that carry
 * the annotated allele
 *
 * Rows come out sample-major (samples in the order given). Within a
 * sample, every site's first annotation instance comes before any second
 * instance, and sites keep their `rowId` order inside each instance rank.
 */
export function joinAndReshape(
  annotations: readonly ParsedAnnotation[],
  calls: readonly SampleCall[],
  sites: readonly SiteRecord[],
  samples: readonly string[],
  filter: AnnotationFilter
): MutationCall[] {
  const siteById = new Map(sites.map((site): [number, SiteRecord] => [site.rowId, site]));
  const callByKey = new Map(
    calls.map((call): [string, SampleCall] => [callKey(call.rowId, call.sampleId), call])
  );
  const kept = annotations
    .filter((annotation) => passesAnnotationFilter(annotation, filter))
    .sort((a, b) => a.index - b.index || a.rowId - b.rowId);

  const rows: MutationCall[] = [];
  for (const sampleId of samples) {
    for (const annotation of kept) {
      const { allele, geneId, hgvsP } = annotation.entry;
      const call = callByKey.get(callKey(annotation.rowId, sampleId));
      const site = siteById.get(annotation.rowId);
      if (!call || !site || allele === null || geneId === null || hgvsP === null) continue;
      if (call.sequence !== allele) continue;

      rows.push({
        sampleId,
        geneId,
        region: site.region,
        pos: annotation.pos,
        hgvsP,
        ref: annotation.ref,
        allele,
      });
    }
  }
  return rows;
}

function callKey(rowId: number, sampleId: string): string {
  return `${rowId}\t${sampleId}`;
}
