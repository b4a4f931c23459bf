/**
 * Binary-or-text classification by content.
 *
 * File names and extensions are ignored: a `.txt` holding image bytes is
 * binary and an extensionless script is text. Only the first SAMPLE_SIZE
 * bytes are inspected:
 *
 *   - empty file                         → text
 *   - UTF-8 byte order mark              → text
 *   - any NUL byte                       → binary
 *   - > 30% control characters           → binary
 *   - not decodable as UTF-8             → binary
 *   - otherwise                          → text
 *
 * Tab, LF, VT, FF, CR, backspace and ESC are not counted as control
 * characters.
 */

import { closeSync, openSync, readSync } from "node:fs";
import { TextDecoder } from "node:util";

import { fsAction } from "./errors.js";

const SAMPLE_SIZE = 1024;

const CONTROL_RATIO_LIMIT = 0.3;

const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

function isControlByte(byte: number): boolean {
  if (byte === 0x08 || byte === 0x1b) return false;
  if (byte >= 0x09 && byte <= 0x0d) return false;
  return byte < 0x20 || byte === 0x7f;
}

function isUtf8(sample: Uint8Array): boolean {
  try {
    // stream: true tolerates a multi-byte sequence cut off at the sample edge
    new TextDecoder("utf-8", { fatal: true }).decode(sample, { stream: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Classify a byte sample.
 */
export function looksBinary(sample: Uint8Array): boolean {
  if (sample.length === 0) return false;

  if (
    sample.length >= UTF8_BOM.length &&
    UTF8_BOM.every((byte, index) => sample[index] === byte)
  ) {
    return false;
  }

  if (sample.includes(0)) return true;

  let controlCount = 0;
  for (const byte of sample) {
    if (isControlByte(byte)) controlCount++;
  }
  if (controlCount / sample.length > CONTROL_RATIO_LIMIT) return true;

  return !isUtf8(sample);
}

/**
 * Read the head of a file and classify it.
 *
 * @throws FilesystemError if the file cannot be read
 */
export function isBinaryFile(filePath: string): boolean {
  const sample = fsAction(filePath, "read", () => {
    const fd = openSync(filePath, "r");
    try {
      const buffer = Buffer.alloc(SAMPLE_SIZE);
      const bytesRead = readSync(fd, buffer, 0, SAMPLE_SIZE, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      closeSync(fd);
    }
  });

  return looksBinary(sample);
}
