/**
 * Gzip support for compressed alignment reports
 *
 * Search reports are often archived as `report.txt.gz`. Decompression uses
 * fflate so it behaves the same everywhere the library runs.
 */

import { Gunzip, gunzipSync } from "fflate";
import { CompressionError } from "../errors";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;
const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Compression format of an input
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection from file extensions and magic bytes
 */
export const CompressionDetector = {
  /**
   * Detect compression from a file name
   */
  fromExtension(path: string): CompressionFormat {
    const lower = path.toLowerCase();
    return GZIP_EXTENSIONS.some((ext) => lower.endsWith(ext)) ? "gzip" : "none";
  },

  /**
   * Detect compression from the first bytes of the data
   */
  fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    return bytes.length >= 2 &&
      bytes[0] === GZIP_MAGIC_FIRST_BYTE &&
      bytes[1] === GZIP_MAGIC_SECOND_BYTE
      ? "gzip"
      : "none";
  },
} as const;

/**
 * Decompress a complete gzip buffer
 *
 * @throws {CompressionError} When the data is not valid gzip
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  if (CompressionDetector.fromMagicBytes(compressed) !== "gzip") {
    throw new CompressionError(
      "Invalid gzip magic bytes - data may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );
  }

  try {
    return gunzipSync(compressed);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "decompress", error, compressed.length);
  }
}

/**
 * Create a TransformStream that gunzips its input chunk by chunk
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  let bytesProcessed = 0;
  let gunzip: Gunzip | undefined;

  const push = (chunk: Uint8Array, final: boolean): void => {
    if (!gunzip) return;
    try {
      gunzip.push(chunk, final);
    } catch (error) {
      throw CompressionError.fromSystemError("gzip", "decompress", error, bytesProcessed);
    }
  };

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller) {
      gunzip = new Gunzip((data) => {
        controller.enqueue(data);
      });
    },
    transform(chunk) {
      bytesProcessed += chunk.length;
      push(chunk, false);
    },
    flush() {
      push(new Uint8Array(0), true);
    },
  });
}
