import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import fsExtra from "fs-extra";

import { isErrnoException } from "../errors.js";

export async function readTextFile(path: string): Promise<string | null> {
  try {
    const content = await fs.readFile(path, "utf8");
    return content;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "EISDIR")) {
      return null;
    }
    throw error;
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await fsExtra.ensureDir(dirname(path));
  await fs.writeFile(path, content, "utf8");
}

export async function appendLines(path: string, lines: string[]): Promise<void> {
  if (lines.length === 0) {
    return;
  }
  await fsExtra.ensureDir(dirname(path));
  await fs.appendFile(path, `${lines.join("\n")}\n`, "utf8");
}

export async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readTextFile(path);
  if (raw === null) {
    return null;
  }
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  await writeTextFile(path, `${JSON.stringify(data)}\n`);
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export async function listSubdirectories(path: string): Promise<string[]> {
  const entries = await fs.readdir(path, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

export async function removeIfExists(path: string): Promise<void> {
  await fsExtra.remove(path);
}
