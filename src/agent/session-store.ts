import * as fs from "fs";
import * as path from "path";

/** Previous session id stored in `file`, or null when absent or blank. */
export function loadSessionId(file: string): string | null {
  if (!fs.existsSync(file)) {
    return null;
  }
  const id = fs.readFileSync(file, "utf-8").trim();
  return id || null;
}

export function saveSessionId(file: string, sessionId: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, sessionId);
}
