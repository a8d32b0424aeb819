import type { DiplomaticMeta } from "./response_parser.js";

export type QualityThresholds = {
  maxUncertain: number;
  maxIllegible: number;
  /** Extra model calls allowed per page when a transcription comes back too uncertain. */
  retryBudget: number;
};

// Hungarian runs get looser limits: agglutinative long words attract more [?] markers.
const THRESHOLDS: Record<string, QualityThresholds> = {
  hu: { maxUncertain: 50, maxIllegible: 20, retryBudget: 1 },
  default: { maxUncertain: 40, maxIllegible: 15, retryBudget: 1 }
};

const UNCERTAIN_RE = /\[\?\]/g;
const ILLEGIBLE_RE = /\[…\]|\[\.\.\.\]/g;

export type MarkerCounts = { uncertain: number; illegible: number };

export function thresholdsForLanguage(language: string): QualityThresholds {
  return THRESHOLDS[language.toLowerCase()] ?? THRESHOLDS.default;
}

export function countMarkers(text: string): MarkerCounts {
  return {
    uncertain: text.match(UNCERTAIN_RE)?.length ?? 0,
    illegible: text.match(ILLEGIBLE_RE)?.length ?? 0
  };
}

function exceeds(counts: MarkerCounts, th: QualityThresholds): boolean {
  return counts.uncertain > th.maxUncertain || counts.illegible > th.maxIllegible;
}

export function shouldRetryForQuality(counts: MarkerCounts, retriesUsed: number, th: QualityThresholds): boolean {
  if (retriesUsed >= th.retryBudget) return false;
  return exceeds(counts, th);
}

export function reviewFlagReasons(meta: DiplomaticMeta, counts: MarkerCounts, th: QualityThresholds): string[] {
  const reasons: string[] = [];
  if (meta.confidence === "low") reasons.push("low_confidence");
  if (counts.uncertain > th.maxUncertain) reasons.push(`uncertain_markers>${th.maxUncertain}`);
  if (counts.illegible > th.maxIllegible) reasons.push(`illegible_spans>${th.maxIllegible}`);
  return reasons;
}
