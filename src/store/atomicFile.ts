import fs from "node:fs";
import path from "node:path";

/** Writes the whole document to a sibling temp file, then renames it over the target. */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const absolutePath = path.resolve(filePath);
  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
  const tempPath = `${absolutePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.promises.writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
    await fs.promises.rename(tempPath, absolutePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

export function readJsonIfExists(filePath: string): unknown {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    return undefined;
  }
  return JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
}
