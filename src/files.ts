import { resolve, dirname } from "node:path";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import type { Readable } from "node:stream";
import { nanoid } from "nanoid";

// =============================================================================
// Types
// =============================================================================

export type ReadError = {
  code: "not_found" | "read_error" | "permission_error";
  message: string;
};

export type ReadResult =
  | { ok: true; text: string; source: string }
  | { ok: false; error: ReadError };

export type WriteError = {
  code: "write_error" | "permission_error";
  message: string;
};

export type WriteResult =
  | { ok: true; path: string }
  | { ok: false; error: WriteError };

/** Path that means "read standard input". */
export const STDIN_PATH = "-";

const BOM = "\uFEFF";

// =============================================================================
// Path Resolution
// =============================================================================

export function resolveDocumentPath(documentPath: string): string {
  return resolve(documentPath);
}

// =============================================================================
// readDocumentText
// =============================================================================

async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

/**
 * Read a document as UTF-8 text from a file, or from `stdin` when `input` is "-".
 *
 * Settings exported on Windows often start with a byte-order mark, which
 * JSON.parse rejects; it is removed here. Never throws.
 */
export async function readDocumentText(
  input: string,
  stdin: Readable = process.stdin,
): Promise<ReadResult> {
  if (input === STDIN_PATH) {
    try {
      return { ok: true, text: stripBom(await readStream(stdin)), source: "stdin" };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        error: { code: "read_error", message: `Failed to read stdin: ${message}` },
      };
    }
  }

  const path = resolveDocumentPath(input);
  try {
    const text = await readFile(path, "utf8");
    return { ok: true, text: stripBom(text), source: path };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message.includes("ENOENT")) {
      return { ok: false, error: { code: "not_found", message: `File not found: ${path}` } };
    }
    const code = message.includes("EACCES") ? "permission_error" : "read_error";
    return {
      ok: false,
      error: { code, message: `Failed to open file: ${message}` },
    };
  }
}

// =============================================================================
// writeDocumentText (atomic write)
// =============================================================================

/**
 * Write text to disk atomically (write a temp file, then rename).
 *
 * - Creates parent directories if they don't exist.
 * - Appends a trailing newline.
 * - The temp file sits beside the destination under a random suffix, so two
 *   writers never share one. It is removed again if the write fails.
 */
export async function writeDocumentText(
  documentPath: string,
  text: string,
): Promise<WriteResult> {
  const path = resolveDocumentPath(documentPath);
  const tmpPath = `${path}.${nanoid(8)}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });

    await writeFile(tmpPath, text + "\n", "utf8");
    await rename(tmpPath, path);

    return { ok: true, path };
  } catch (err) {
    let message = err instanceof Error ? err.message : String(err);
    const code = message.includes("EACCES") ? "permission_error" : "write_error";

    await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
      const detail = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
      message += ` (temp file ${tmpPath} left behind: ${detail})`;
    });

    return {
      ok: false,
      error: { code, message: `Failed to save file: ${message}` },
    };
  }
}
