import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname } from 'node:path';

export async function ensureDir(path: string) {
  await mkdir(path, { recursive: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readText(file: string): Promise<string> {
  const buf = await readFile(file, 'utf8');
  // Editors on Windows like to prepend a BOM to UTF-8 JSON.
  return buf.charCodeAt(0) === 0xfeff ? buf.slice(1) : buf;
}

// JSON.stringify keeps non-ASCII characters as-is, so CJK names stay readable.
export function formatJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export async function writeJson(file: string, data: unknown) {
  await ensureDir(dirname(file));
  await writeFile(file, formatJson(data), 'utf8');
}
