import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export const writeJsonFile = async <T>(filePath: string, value: T): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
  console.log(`  Saved ${filePath}`);
};
