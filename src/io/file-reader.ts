/**
 * File reading utilities on top of Effect Platform
 *
 * Every input of a run is read whole: the join needs the complete classify
 * report before the read-status table can be folded. Gzipped inputs are
 * inflated transparently.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, decompressGzip } from "../compression";
import { CompressionError, FileError } from "../errors";
import type { FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { getPlatform } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxFileSize: 10_737_418_240, // 10GB
  autoDecompress: true,
};

/**
 * Check if a regular file exists at the path (symlinks are followed)
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Check if a directory exists at the path
 */
export async function isDirectory(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "Directory";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Read a whole file as bytes, inflating gzip content when enabled
 *
 * @throws {FileError} If the file cannot be read or is too large
 * @throws {CompressionError} If gzip content is corrupt
 */
export async function readBytes(path: string, options: FileReaderOptions = {}): Promise<Uint8Array> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const fileSize = await getSize(validatedPath);
  if (fileSize > mergedOptions.maxFileSize) {
    throw new FileError(
      `File too large: ${fileSize} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
      validatedPath,
      "read"
    );
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFile(validatedPath);
  });

  let bytes: Uint8Array;
  try {
    bytes = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }

  if (!mergedOptions.autoDecompress) {
    return bytes;
  }

  const detection = CompressionDetector.hybrid(validatedPath, bytes.subarray(0, 4));
  if (detection.format === "gzip") {
    return decompressGzip(bytes);
  }
  if (CompressionDetector.fromExtension(validatedPath) === "gzip" && bytes.length > 0) {
    throw new CompressionError(
      `${validatedPath} has a gzip extension but is not gzip compressed`,
      "gzip",
      "detect"
    );
  }
  return bytes;
}

/**
 * Read entire file to string
 *
 * @throws {FileError} If file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const bytes = await readBytes(path, options);
  return new TextDecoder().decode(bytes);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return { ...DEFAULT_OPTIONS, ...options };
}

export { validatePath };
