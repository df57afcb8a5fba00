/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Each text format (DSV, FASTQ) keeps its own parsing logic; the base class
 * only merges defaults and gives every parser the same AbortSignal behaviour.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: Required<ParserOptions> & Partial<TOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const baseDefaults: Required<ParserOptions> = {
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      signal: new AbortController().signal,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...this.getDefaultOptions(), ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops to enable Ctrl+C interruption
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file (gzip handled transparently)
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Format identifier used in error messages (e.g. "CSV", "FASTQ")
   */
  protected abstract getFormatName(): string;
}

/**
 * Interrupt handler utility for AbortSignal integration
 */
class InterruptHandler {
  constructor(private readonly signal: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(): void {
    if (this.signal.aborted) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }
}
