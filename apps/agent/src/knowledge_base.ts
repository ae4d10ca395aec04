/**
 * File: apps/agent/src/knowledge_base.ts
 *
 * Plain-text maintenance knowledge base with line-level keyword lookup.
 *
 * Rules:
 * - Documents are the *.txt files of one directory, in sorted filename order.
 * - A snippet is "<file>:L<line>: <trimmed line>"; a snippet is never repeated.
 * - Keyword pass: each term in order, case-insensitive substring per line.
 * - Contextual pass (signature 115-125 Hz): at most one line per file per rule,
 *   tagged with the matched frequency (and temperature rise for the oil rule).
 * - Nothing found: a single sentinel snippet.
 */

import fs from "node:fs";
import path from "node:path";

import type { Log } from "@pdm/runtime";

export const NO_KB_MATCH = "No specific KB articles found matching the immediate query criteria.";

const CONTEXT_BAND_HZ = { lo: 115, hi: 125 } as const;
const OIL_RISE_MIN_C = 4.5;

export type KbDocument = { name: string; lines: string[] };

export type KbQueryContext = {
  signature_frequency_hz: number | null;
  temperature_increase_c: number;
};

type LineRule = (line: string) => boolean;

export class KnowledgeBase {
  constructor(private readonly docs: KbDocument[]) {}

  static fromDirectory(dir: string, log: Log, cwd: string = process.cwd()): KnowledgeBase {
    let effective = dir;
    if (!fs.existsSync(effective)) {
      const fallback = path.join(cwd, "knowledge_base");
      log.info({ dir, fallback }, "knowledge base path not found; trying fallback");
      if (!fs.existsSync(fallback)) {
        log.error({ dir, fallback }, "knowledge base directory missing; lookups will return no articles");
        return new KnowledgeBase([]);
      }
      effective = fallback;
    }

    const names = fs
      .readdirSync(effective)
      .filter((f) => f.endsWith(".txt"))
      .sort();
    const docs = names.map((name) => ({
      name,
      lines: fs.readFileSync(path.join(effective, name), "utf8").split(/\r?\n/),
    }));
    if (!docs.length) log.warn({ dir: effective }, "knowledge base has no .txt files");
    else log.info({ dir: effective, files: names }, "knowledge base loaded");
    return new KnowledgeBase(docs);
  }

  get fileCount(): number {
    return this.docs.length;
  }

  query(assetId: string, ctx: KbQueryContext, terms: string[]): string[] {
    const found: string[] = [];
    const add = (s: string) => {
      if (!found.includes(s)) found.push(s);
    };

    for (const term of terms) {
      const needle = term.toLowerCase();
      for (const doc of this.docs) {
        doc.lines.forEach((line, i) => {
          if (line.toLowerCase().includes(needle)) add(snippet(doc.name, i, line));
        });
      }
    }

    const freq = ctx.signature_frequency_hz;
    if (freq && freq >= CONTEXT_BAND_HZ.lo && freq <= CONTEXT_BAND_HZ.hi) {
      const tag = ` (Context: Matched ${freq}Hz)`;
      this.firstPerFile((l) => l.includes("115-125Hz") && l.includes("gear tooth pitting"), tag, add);
      this.firstPerFile((l) => l.includes("120Hz") && (l.includes("G-5432") || l.includes("bearing assembly failure")), tag, add);
      if (ctx.temperature_increase_c > OIL_RISE_MIN_C) {
        this.firstPerFile(
          (l) => l.includes("GRX-II") && l.includes("oil temperature") && l.includes("rise >5°C"),
          ` (Context: Matched ${freq}Hz & ${ctx.temperature_increase_c}°C rise)`,
          add,
        );
      }
    }

    return found.length ? found : [NO_KB_MATCH];
  }

  private firstPerFile(rule: LineRule, suffix: string, add: (s: string) => void): void {
    for (const doc of this.docs) {
      const i = doc.lines.findIndex(rule);
      const line = doc.lines[i];
      if (line !== undefined) add(snippet(doc.name, i, line) + suffix);
    }
  }
}

function snippet(file: string, index: number, line: string): string {
  return `${file}:L${index + 1}: ${line.trim()}`;
}

export function hasKbMatches(snippets: string[]): boolean {
  return snippets.length > 0 && snippets[0] !== NO_KB_MATCH;
}
