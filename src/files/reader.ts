/**
 * Raw source file reading with an encoding fallback.
 */

import * as fs from "fs";
import { FileAccessError } from "../errors";
import { logger, errorMessage } from "../logger";

/**
 * Decode bytes as strict UTF-8, falling back to latin1 when the bytes are
 * not valid UTF-8. A leading BOM is dropped.
 */
export function decodeSource(buffer: Buffer, filePath = "<buffer>"): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch (err) {
    logger.debug("Not valid UTF-8, decoding as latin1", { filePath, error: errorMessage(err) });
    return buffer.toString("latin1");
  }
}

/**
 * Read a source file as text. Throws FileAccessError when the file cannot
 * be read at all.
 */
export async function readSourceFile(filePath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await fs.promises.readFile(filePath);
  } catch (err) {
    throw new FileAccessError(`Cannot read file: ${errorMessage(err)}`, filePath);
  }
  return decodeSource(buffer, filePath);
}
