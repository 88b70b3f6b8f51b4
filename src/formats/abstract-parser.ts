/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Parsers in this package materialise their whole input (the pipeline
 * holds every record in memory), so `parseString` is synchronous and `parseFile`
 * only adds the async read in front of it.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Base options after defaults are applied
 */
export type ResolvedParserOptions = Required<Omit<ParserOptions, "signal">>;

/**
 * Abstract parser base class
 *
 * Subclasses resolve their own format-specific options; the base handles
 * the shared ones.
 *
 * @template T - The parsed result (e.g. a VariantTable)
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: ResolvedParserOptions = {
      maxLineLength: 10_000_000,
      trackLineNumbers: true,
      onWarning: (warning: string, lineNumber?: number): void => {
        const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
        console.warn(`${this.getFormatName()} Warning${where}: ${warning}`);
      },
    };

    this.options = {
      maxLineLength: options.maxLineLength ?? baseDefaults.maxLineLength,
      trackLineNumbers: options.trackLineNumbers ?? baseDefaults.trackLineNumbers,
      onWarning: options.onWarning ?? baseDefaults.onWarning,
    };
    this.interruptHandler = new InterruptHandler(options.signal);
  }

  /**
   * Check abortion with format context; call inside parsing loops
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  /**
   * Parse a complete document held in memory
   */
  abstract parseString(data: string): T;

  /**
   * Read and parse a file (plain or gzip-compressed)
   */
  abstract parseFile(filePath: string): Promise<T>;

  /**
   * Format name for error messages and warnings (e.g. "VCF")
   */
  protected abstract getFormatName(): string;
}

class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
