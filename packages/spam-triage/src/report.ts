/**
 * Triage report — spam/safe split at a threshold, plus score bands.
 */
import type { ScoreBands, SpamVerdict, TriageReport } from "./types.ts";

export const DEFAULT_SPAM_THRESHOLD = 50;

export function scoreBands(verdicts: readonly SpamVerdict[]): ScoreBands {
  const bands: ScoreBands = { high: 0, medium: 0, low: 0 };
  for (const { score } of verdicts) {
    if (score >= 75) bands.high++;
    else if (score >= 25) bands.medium++;
    else bands.low++;
  }
  return bands;
}

/** A verdict counts as spam when its score is at or above `threshold` */
export function buildReport(
  verdicts: readonly SpamVerdict[],
  threshold: number = DEFAULT_SPAM_THRESHOLD,
): TriageReport {
  const spam = verdicts.filter((v) => v.score >= threshold);
  const safe = verdicts.filter((v) => v.score < threshold);
  const totalScore = verdicts.reduce((sum, v) => sum + v.score, 0);

  return {
    total: verdicts.length,
    spamCount: spam.length,
    safeCount: safe.length,
    threshold,
    averageScore: verdicts.length > 0 ? totalScore / verdicts.length : 0,
    spam,
    safe,
    failed: verdicts.filter((v) => v.error !== undefined),
    bands: scoreBands(verdicts),
  };
}
