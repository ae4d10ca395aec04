import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function nowMs(): number {
  return Date.now();
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) return x.map(canonicalize);
  if (typeof x === "object") {
    const src = Object.fromEntries(Object.entries(x));
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(src).sort()) out[k] = canonicalize(src[k]);
    return out;
  }
  return x;
}

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * Why:
 * - In npm workspaces, process.cwd() may be either repo root or a workspace dir.
 * - Config files (e.g., config/edge/default.json) live at the repo root.
 *
 * Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const probe = path.join(cur, requiredRelativePath);
    if (fs.existsSync(probe)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}

/**
 * Fills `{name}` and `{name:03d}` placeholders from `vars`.
 * Unknown placeholders are left as written.
 */
export function formatTemplate(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)(?::0(\d+)d)?\}/g, (whole: string, key: string, width?: string) => {
    const v = vars[key];
    if (v === undefined) return whole;
    if (width === undefined) return String(v);
    return zeroPad(typeof v === "number" ? v : Number(v), Number(width));
  });
}

export function zeroPad(n: number, width: number): string {
  const sign = n < 0 ? "-" : "";
  return sign + String(Math.trunc(Math.abs(n))).padStart(width, "0");
}

// --- environment readers (empty string counts as unset) ---

export function envString(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const v = env[name];
  return typeof v === "string" && v.length ? v : undefined;
}

export function envInt(name: string, env: NodeJS.ProcessEnv = process.env): number | undefined {
  const raw = envString(name, env);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n) || !Number.isInteger(n)) throw new Error(`invalid ${name}: expected an integer, got "${raw}"`);
  return n;
}
