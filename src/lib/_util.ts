import fs from "node:fs";
import path from "node:path";

export function nowUtc(): string {
  return new Date().toISOString();
}

export function safeJsonParse<T>(s: string): T | null {
  try { return JSON.parse(s) as T; } catch { return null; }
}

export function ensureDir(p: string) {
  fs.mkdirSync(p, { recursive: true });
}

/** Parses one JSON value per line; blank and unparseable lines are skipped. */
export function readJsonl<T>(filePath: string): T[] {
  if (!fs.existsSync(filePath)) return [];
  const raw = fs.readFileSync(filePath, "utf8");
  const lines = raw.split("\n").map(x => x.trim()).filter(Boolean);
  const out: T[] = [];
  for (const line of lines) {
    const v = safeJsonParse<T>(line);
    if (v) out.push(v);
  }
  return out;
}

export function appendJsonl(filePath: string, obj: unknown) {
  ensureDir(path.dirname(filePath));
  fs.appendFileSync(filePath, JSON.stringify(obj) + "\n");
}
