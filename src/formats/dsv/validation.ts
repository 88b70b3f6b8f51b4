/**
 * DSV writer option validation
 */

import { type } from "arktype";

export const DSVWriterOptionsSchema = type({
  "delimiter?": "',' | '\t' | ';' | '|'",
  "quote?": "string",
  "header?": "boolean",
  "lineEnding?": "'\n' | '\r\n'",
  "quoteAll?": "boolean",
  "excelCompatible?": "boolean",
  "compression?": "'gzip' | null",
  "compressionLevel?": "1<=number.integer<=9",
}).narrow((options, ctx) => {
  if (options.quote !== undefined && options.quote.length !== 1) {
    return ctx.reject({
      path: ["quote"],
      expected: "single character quote",
      actual: `${options.quote.length} characters`,
    });
  }
  if (options.quote !== undefined && options.quote === options.delimiter) {
    return ctx.reject({
      path: ["quote"],
      expected: "a quote character different from the delimiter",
    });
  }
  return true;
});
