import { promises as fs } from "fs";
import path from "path";
import { sleep } from "./concurrency";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf8");
  return JSON.parse(content);
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
}

/** Write to a sibling temp file, then rename over the target. */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
  await fs.rename(tmpPath, filePath);
}

export async function writeJsonLines(filePath: string, records: unknown[]): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  const content = records.map((record) => JSON.stringify(record)).join("\n");
  await fs.writeFile(filePath, content + (records.length ? "\n" : ""), "utf8");
}

export async function appendJsonLines(filePath: string, records: unknown[]): Promise<void> {
  if (records.length === 0) return;
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  const content = records.map((record) => JSON.stringify(record)).join("\n");
  await fs.appendFile(filePath, content + "\n", "utf8");
}

export function parseJsonLines(content: string, label: string): unknown[] {
  const records: unknown[] = [];
  const lines = content.split(/\r?\n/);
  for (const [index, line] of lines.entries()) {
    if (!line.trim()) continue;
    try {
      records.push(JSON.parse(line));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`${label}:${index + 1} is not valid JSON: ${reason}`);
    }
  }
  return records;
}

export async function readJsonLines(filePath: string): Promise<unknown[]> {
  const content = await fs.readFile(filePath, "utf8");
  return parseJsonLines(content, filePath);
}

export interface LockFileOptions {
  attempts?: number;
  delayMs?: number;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

async function acquireLockFile(lockPath: string, attempts: number, delayMs: number): Promise<fs.FileHandle> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fs.open(lockPath, "wx");
    } catch (error) {
      if (!isAlreadyExists(error)) throw error;
      if (attempt >= attempts) {
        throw new Error(`Timed out waiting for lock ${lockPath}; remove it if no writer is running`);
      }
      await sleep(delayMs);
    }
  }
}

/**
 * Runs `work` while holding `lockPath`, created exclusively. Another holder
 * makes the call wait and retry until `attempts` run out.
 */
export async function withLockFile<T>(
  lockPath: string,
  work: () => Promise<T>,
  options: LockFileOptions = {}
): Promise<T> {
  const attempts = options.attempts ?? 200;
  const delayMs = options.delayMs ?? 25;
  await ensureDir(path.dirname(lockPath));

  const handle = await acquireLockFile(lockPath, attempts, delayMs);
  try {
    await handle.writeFile(String(process.pid), "utf8");
    return await work();
  } finally {
    await handle.close();
    await fs.unlink(lockPath);
  }
}
