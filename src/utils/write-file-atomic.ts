import { rename, rm, writeFile } from "fs/promises";

export const TEMP_FILE_PATTERN = /\.\d+\.tmp$/;

/**
 * Write a file through a temporary sibling and a rename, so readers only
 * ever see the old content or the complete new content
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
