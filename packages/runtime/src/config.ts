// packages/runtime/src/config.ts
//
// Area config loading.
//
// Contract:
// - Source of truth: config/<area>/<profile>.json at the repo root.
// - Profile: explicit argument, else PDM_CONFIG_PROFILE, else "default".
// - config_hash: sha256(stableStringify(parsedJson)) with "sha256:" prefix,
//   computed over the file as written (before env overrides).
// - The caller's zod schema decides defaults and rejects unknown keys.

import fs from "node:fs";
import path from "node:path";

import type { z } from "zod";

import { findRepoRoot, sha256Hex, stableStringify } from "./util";

export type ConfigArea = "sensor" | "edge" | "agent";

export class ConfigLoadError extends Error {
  public readonly path: string;
  public readonly issues: string[];

  constructor(p: string, message: string, issues: string[] = []) {
    super(`${message}: ${p}${issues.length ? ` (${issues.join("; ")})` : ""}`);
    this.name = "ConfigLoadError";
    this.path = p;
    this.issues = issues;
  }
}

export type LoadedConfig<T> = {
  config: T;
  config_hash: string;
  source: string; // repo-relative path
  repo_root: string;
};

export type LoadConfigOptions = {
  profile?: string;
  repoRoot?: string;
};

export function configProfile(explicit?: string): string {
  return explicit ?? process.env.PDM_CONFIG_PROFILE ?? "default";
}

export function configRelPath(area: ConfigArea, profile: string): string {
  return path.join("config", area, `${profile}.json`);
}

export function resolveRepoRoot(area: ConfigArea, profile: string = configProfile()): string {
  // 1) explicit override (CI / container convenience)
  if (process.env.PDM_REPO_ROOT) return path.resolve(process.env.PDM_REPO_ROOT);

  // 2) local dev: walk upward from cwd until the area config is found
  return findRepoRoot(process.cwd(), configRelPath(area, profile));
}

export function computeConfigHash(cfg: unknown): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

function readJsonFile(p: string): unknown {
  if (!fs.existsSync(p)) throw new ConfigLoadError(p, "config file not found");
  const raw = fs.readFileSync(p, "utf8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigLoadError(p, "config file is not valid JSON", [String(err instanceof Error ? err.message : err)]);
  }
}

export function loadAreaConfig<S extends z.ZodTypeAny>(
  area: ConfigArea,
  schema: S,
  opts: LoadConfigOptions = {},
): LoadedConfig<z.output<S>> {
  const profile = configProfile(opts.profile);
  const repoRoot = opts.repoRoot ?? resolveRepoRoot(area, profile);
  const rel = configRelPath(area, profile);
  const abs = path.join(repoRoot, rel);

  const raw = readJsonFile(abs);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new ConfigLoadError(abs, "config file failed validation", issues);
  }

  return { config: parsed.data, config_hash: computeConfigHash(raw), source: rel, repo_root: repoRoot };
}
