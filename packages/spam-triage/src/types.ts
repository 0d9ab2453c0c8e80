/**
 * Spam triage types.
 */

/** One inbound message supplied by a MessageSource */
export interface InboundMessage {
  id: string;
  subject: string;
  body: string;
  sender?: string;
  date?: string;
}

/** Mail retrieval lives outside this package; it only has to hand over records */
export interface MessageSource {
  fetchMessages(): Promise<InboundMessage[]>;
}

export interface SpamVerdict {
  messageId: string;
  subject: string;
  /** Spam probability in percent, 0–100 */
  score: number;
  category: string;
  /** Set when the message could not be analyzed; score is then 0 */
  error?: string;
}

export interface ScoreBands {
  /** score >= 75 */
  high: number;
  /** 25 <= score < 75 */
  medium: number;
  /** score < 25 */
  low: number;
}

export interface TriageReport {
  total: number;
  spamCount: number;
  safeCount: number;
  threshold: number;
  averageScore: number;
  spam: SpamVerdict[];
  safe: SpamVerdict[];
  /** Verdicts whose analysis failed; also counted as safe */
  failed: SpamVerdict[];
  bands: ScoreBands;
}
