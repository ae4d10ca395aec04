import fs from "node:fs";
import path from "node:path";

/**
 * Minimal KEY=VALUE loader. Comments and blank lines are skipped, surrounding
 * quotes are stripped, and variables already present in `env` are kept.
 */
export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): number {
  if (!fs.existsSync(fp)) return 0;
  const raw = fs.readFileSync(fp, "utf8");
  let applied = 0;
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    if (key === undefined) continue;
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (env[key] == null) {
      env[key] = val;
      applied += 1;
    }
  }
  return applied;
}

/**
 * Load repo root .env first, then the app-local .env. Since neither file
 * overwrites an existing variable, the repo root wins on conflicts and the
 * app file only fills gaps.
 */
export function loadEnv(repoRoot: string, appDir?: string): void {
  loadDotEnvFile(path.join(repoRoot, ".env"));
  if (appDir) loadDotEnvFile(path.join(appDir, ".env"));
}
