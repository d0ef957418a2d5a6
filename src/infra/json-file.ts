import fs from "node:fs";
import path from "node:path";

/** Missing, unreadable or non-JSON files all read as `undefined`. */
export function loadJsonFile(pathname: string): unknown {
  try {
    if (!fs.existsSync(pathname)) return undefined;
    const raw = fs.readFileSync(pathname, "utf8");
    return JSON.parse(raw) as unknown;
  } catch {
    return undefined;
  }
}

/** Throws on failure; callers on the render path catch and log. */
export function saveJsonFile(pathname: string, data: unknown) {
  const dir = path.dirname(pathname);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  fs.writeFileSync(pathname, `${JSON.stringify(data, null, 2)}\n`, "utf8");
  fs.chmodSync(pathname, 0o600);
}

export function removeFile(pathname: string): boolean {
  if (!fs.existsSync(pathname)) return false;
  fs.rmSync(pathname, { force: true });
  return true;
}
