import * as path from "node:path";
import pino from "pino";
import { InputError } from "../errors.js";

const logger = pino({ name: "upload" });

export const ALLOWED_EXTENSIONS = [".xml", ".txt", ".bwp", ".process"] as const;
export const LARGE_FILE_THRESHOLD = 5000;
export const PREVIEW_LENGTH = 2000;

export interface UploadInfo {
  name: string;
  size: number;
  large: boolean;
  /** Whole text for small files, the first PREVIEW_LENGTH characters plus "..." for large ones. */
  preview: string;
}

export function assertAllowedFile(name: string): void {
  const extension = path.extname(name).toLowerCase();
  if (!ALLOWED_EXTENSIONS.some((allowed) => allowed === extension)) {
    throw new InputError(
      `Unsupported file type "${extension || name}". Allowed: ${ALLOWED_EXTENSIONS.join(", ")}`,
    );
  }
}

/**
 * Decode uploaded bytes as UTF-8, falling back to Latin-1 when the bytes
 * are not valid UTF-8. Latin-1 decodes any byte sequence.
 */
export function decodeBytes(name: string, bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    logger.debug({ name, error: error instanceof Error ? error.message : String(error) }, "Not UTF-8, decoding as Latin-1");
    return Buffer.from(bytes).toString("latin1");
  }
}

/** Validate the file name and decode its content. */
export function decodeUpload(name: string, content: string, encoding: "utf8" | "base64"): string {
  assertAllowedFile(name);
  const bytes = Buffer.from(content, encoding);
  return decodeBytes(name, bytes);
}

export function describeUpload(name: string, text: string): UploadInfo {
  const large = text.length > LARGE_FILE_THRESHOLD;
  const preview =
    large && text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
  return { name, size: text.length, large, preview };
}
