import * as fs from "fs";
import * as path from "path";

export async function readBinaryFileAsync(filePath: string): Promise<Uint8Array> {
  const data = await fs.promises.readFile(filePath);
  return new Uint8Array(data);
}

// Writes to a sibling temp file then renames over the target, so a failed
// write never leaves a partial output file behind.
export async function writeBinaryFileAtomic(filePath: string, data: Uint8Array): Promise<void> {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    await fs.promises.writeFile(tempPath, Buffer.from(data));
    await fs.promises.rename(tempPath, filePath);
  } catch (e) {
    await fs.promises.rm(tempPath, { force: true });
    throw e;
  }
}
