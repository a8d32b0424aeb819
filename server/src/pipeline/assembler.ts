import type { AgentStateRecord, Coverage } from "../state_store.js";
import { findPage } from "../state_store.js";
import { sha256Hex } from "./utils.js";

export const MISSING_PAGE_MARKER = "[MISSING PAGE TRANSCRIPTION]";

export type PageText = { page: number; text: string | null };

export type Assembly = {
  text: string;
  hash: string;
  coverage: Coverage;
};

export function sourceHeader(sourceId: string): string {
  return `=== SOURCE: ${sourceId} ===`;
}

export function pageHeader(page: number): string {
  return `=== PAGE ${page} ===`;
}

export function expectedPages(record: AgentStateRecord): number[] {
  return Array.from({ length: record.pages_total }, (_, i) => i + 1);
}

export function computeCoverage(expected: number[], included: number[]): Coverage {
  const have = new Set(included);
  const missing = expected.filter((n) => !have.has(n));
  return {
    expected,
    included: expected.filter((n) => have.has(n)),
    missing,
    complete: expected.length > 0 && missing.length === 0
  };
}

/**
 * Source header, then one `=== PAGE N ===` section per page in ascending order. Pages
 * without text get an explicit marker instead of being dropped.
 */
export function concatenatePages(sourceId: string, pages: PageText[]): string {
  const parts = [sourceHeader(sourceId), ""];
  for (const p of [...pages].sort((a, b) => a.page - b.page)) {
    parts.push(pageHeader(p.page));
    parts.push(p.text === null ? MISSING_PAGE_MARKER : p.text.replace(/\s+$/, ""));
    parts.push("");
  }
  return parts.join("\n");
}

export function succeededPageTexts(record: AgentStateRecord): PageText[] {
  return expectedPages(record).map((n) => {
    const page = findPage(record, n);
    const text = page?.status === "succeeded" && page.diplomatic_text ? page.diplomatic_text : null;
    return { page: n, text };
  });
}

export function assembleV1(record: AgentStateRecord): Assembly {
  const pages = succeededPageTexts(record);
  const text = concatenatePages(record.source_id, pages);
  const coverage = computeCoverage(
    pages.map((p) => p.page),
    pages.filter((p) => p.text !== null).map((p) => p.page)
  );
  return { text, hash: sha256Hex(text), coverage };
}
