/**
 * Compression support for VCF inputs and result outputs
 *
 * @module compression
 */

export { CompressionDetector } from "./detector";
export { compress, decompress, type GzipOptions } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";
export { CompressionError } from "../errors";
