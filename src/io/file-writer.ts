/**
 * File writing operations using Effect Platform
 *
 * Promise-based wrappers around the `FileSystem` service: whole-file writes
 * (gzip by `.gz` extension), directory creation and symlinks for job-directory
 * staging.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, compressGzip } from "../compression";
import { FileError, ValidationError } from "../errors";
import type { WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { validatePath } from "./file-reader";
import { getPlatform } from "./runtime";

/**
 * Apply compression to data if the options and file extension call for it
 */
async function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions = {}
): Promise<Uint8Array> {
  const validation = WriteOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid write options: ${validation.summary}`);
  }

  const autoCompress = options.autoCompress ?? true;
  if (!autoCompress || CompressionDetector.fromExtension(filePath) === "none") {
    return data;
  }

  return compressGzip(data, options.compressionLevel ?? 6);
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When write operation fails or path is invalid
 *
 * @example Automatic gzip compression
 * ```typescript
 * await writeString("fl_count.csv.gz", csv);
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options?: WriteOptions
): Promise<void> {
  const data = new TextEncoder().encode(content);
  await writeBytes(path, data, options);
}

/**
 * Write binary data to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When write operation fails or path is invalid
 */
export async function writeBytes(
  path: string,
  content: Uint8Array,
  options?: WriteOptions
): Promise<void> {
  const validatedPath = validatePath(path);
  const finalData = await applyCompression(content, validatedPath, options);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(validatedPath, finalData);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}

/**
 * Create a directory and any missing parents
 */
export async function makeDirectory(path: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(validatedPath, { recursive: true });
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", validatedPath, error);
  }
}

/**
 * Create a symbolic link at `linkPath` pointing to `target`
 *
 * @throws {FileError} When `linkPath` already exists or the link cannot be made
 */
export async function makeSymlink(target: string, linkPath: string): Promise<void> {
  const validatedTarget = validatePath(target);
  const validatedLink = validatePath(linkPath);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.symlink(validatedTarget, validatedLink);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("link", validatedLink, error);
  }
}
