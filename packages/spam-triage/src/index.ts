export { SpamTriage, DEFAULT_TRIAGE_USER } from "./triage.ts";
export type { SpamTriageOptions } from "./triage.ts";
export { buildReport, scoreBands, DEFAULT_SPAM_THRESHOLD } from "./report.ts";
export {
  buildCategoryPrompt,
  buildScorePrompt,
  parseCategory,
  parseScore,
  UNKNOWN_CATEGORY,
} from "./prompts.ts";
export type {
  InboundMessage,
  MessageSource,
  ScoreBands,
  SpamVerdict,
  TriageReport,
} from "./types.ts";
