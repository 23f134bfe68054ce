import * as fs from "node:fs";
import * as path from "node:path";

/** Read a UTF-8 text file. */
export async function readText(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, "utf-8");
}

/** Write a UTF-8 text file, creating parent directories as needed. */
export async function writeText(filePath: string, contents: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, contents, "utf-8");
}
