import * as fs from "fs";
import * as path from "path";
import { DocumentWriteError, errorMessage } from "./errors";

/**
 * Writes the document in one scoped operation: the bytes go to a temporary
 * sibling first and are renamed over the target, so the output path holds
 * either the whole document or nothing new.
 */
export function saveDocument(buffer: Buffer, outputPath: string): void {
  const resolved = path.resolve(outputPath);
  const tempPath = path.join(
    path.dirname(resolved),
    `.${path.basename(resolved)}.${process.pid}.${Date.now()}.tmp`
  );

  try {
    const fd = fs.openSync(tempPath, "w");
    try {
      fs.writeSync(fd, buffer);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tempPath, resolved);
  } catch (error) {
    try {
      fs.rmSync(tempPath, { force: true });
    } catch (cleanupError) {
      console.warn(`[documentWriter] Could not remove ${tempPath}:`, errorMessage(cleanupError));
    }
    console.error(`[documentWriter] ERROR writing ${resolved}:`, errorMessage(error));
    throw new DocumentWriteError(`Failed to write document to ${resolved}: ${errorMessage(error)}`, resolved, {
      cause: error,
    });
  }

  console.log(`[documentWriter] Wrote ${buffer.length} bytes to ${resolved}`);
}
