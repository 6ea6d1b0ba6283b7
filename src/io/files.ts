import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { StructuralError } from "../errors.js";

export async function readJsonFile(path: string): Promise<unknown> {
  const text = await readFile(path, "utf-8");
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (e: unknown) {
    throw new StructuralError(`not valid JSON: ${e instanceof Error ? e.message : String(e)}`, path);
  }
}

export async function writeJson(path: string, obj: unknown): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(obj, null, 2), "utf-8");
  return path;
}
