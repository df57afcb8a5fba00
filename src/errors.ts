/**
 * Error handling for FL count demultiplexing
 *
 * Every failure in a run is fatal: a missing input, a table without the
 * fields it needs, or a full-length read that the classify report never saw.
 * Errors carry enough context (file, line, field) to find the offending input.
 */

/**
 * Base error class for all fl-demux errors
 */
export class FlDemuxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FlDemuxError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options
 */
export class ValidationError extends FlDemuxError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends FlDemuxError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined ? `line ${line}` : "",
      column !== undefined ? `column ${column}` : "",
      field !== undefined ? `field "${field}"` : "",
    ]
      .filter((part) => part !== "")
      .join(", ");

    super(context !== "" ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends FlDemuxError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    let suggestion = "";
    if (msg.includes("header") || msg.includes("magic")) {
      suggestion = `. File may be corrupted or not actually ${format} compressed`;
    } else if (msg.includes("unexpected end")) {
      suggestion = ". File appears to be truncated or incomplete";
    }

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with system error context
 */
export class FileError extends FlDemuxError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "link",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("notfound") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permissiondenied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("eexist") || msg.includes("alreadyexists")) {
      return "Remove the existing file or choose another directory";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}

/**
 * A required input file does not exist at the given or resolved path.
 * Raised before any parsing starts.
 */
export class MissingFileError extends FlDemuxError {
  constructor(
    public readonly filePath: string,
    public readonly role: string
  ) {
    super(`${role} not found: ${filePath}`, "MISSING_FILE", undefined, `path: ${filePath}`);
    this.name = "MissingFileError";
  }
}

/**
 * A table header lacks a field the join needs
 */
export class FormatError extends FlDemuxError {
  constructor(
    message: string,
    public readonly format: string,
    public readonly missingFields: readonly string[] = [],
    lineNumber?: number,
    context?: string
  ) {
    super(message, "FORMAT_ERROR", lineNumber, context);
    this.name = "FormatError";
  }

  static forMissingFields(
    format: string,
    missingFields: readonly string[],
    header: readonly string[]
  ): FormatError {
    const plural = missingFields.length > 1 ? "s" : "";
    return new FormatError(
      `${format} is missing required field${plural}: ${missingFields.join(", ")}`,
      format,
      missingFields,
      1,
      `header: ${header.join(",")}`
    );
  }
}

/**
 * A full-length read in the read-status table has no entry in the classify
 * report. The two files come from mismatched pipeline runs.
 */
export class MissingReadError extends FlDemuxError {
  constructor(
    public readonly readId: string,
    public readonly isoformId: string,
    lineNumber?: number
  ) {
    super(
      `Full-length read ${readId} (isoform ${isoformId}) is not in the classify report`,
      "MISSING_READ",
      lineNumber,
      "read-status table and classify report appear to come from different pipeline runs"
    );
    this.name = "MissingReadError";
  }
}
