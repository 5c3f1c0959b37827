/**
 * Small filesystem helpers shared by the checkpoint store and the queue.
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Write a file by writing a sibling temp file and renaming it over the
 * target. Same-directory rename is atomic on POSIX filesystems, so readers
 * see either the old contents or the new, never a partial write.
 *
 * Creates the parent directory. Throws on failure after removing the temp
 * file.
 */
export function writeFileAtomic(filePath: string, contents: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });

  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.tmp.${crypto.randomBytes(4).toString("hex")}`,
  );

  try {
    fs.writeFileSync(tmpPath, contents, "utf-8");
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    try {
      fs.rmSync(tmpPath, { force: true });
    } catch {
      // Ignore cleanup errors
    }
    throw err;
  }
}

/** True for an fs error caused by a missing path */
export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
