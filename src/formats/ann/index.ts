/**
 * snpEff ANN annotation module exports
 *
 * @module ann
 */

export {
  extractAnnotationPayload,
  formatOverflow,
  parseAnnotationEntry,
  splitAnnotationInstances,
} from "./parser";
export type { AnnotationEntry, AnnotationField, AnnotationFields } from "./types";
export {
  ANNOTATION_FIELDS,
  ANNOTATION_MARKER,
  FIELD_SEPARATOR,
  INSTANCE_SEPARATOR,
} from "./types";
