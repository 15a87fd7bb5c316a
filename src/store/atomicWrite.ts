import fs from "fs/promises";
import path from "path";
import { randomBytes } from "crypto";

/** Suffix of in-progress writes; readers and listings ignore these files. */
export const TEMP_SUFFIX = ".tmp";

/**
 * Writes a file so that readers only ever see the old or the new content.
 * Data goes to a unique temp file in the same directory, which is then
 * renamed over the target. The temp file is removed if anything fails.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string
): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(6).toString("hex")}${TEMP_SUFFIX}`
  );

  await fs.mkdir(dir, { recursive: true });
  try {
    await fs.writeFile(tempPath, data, "utf-8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
