/**
 * Prompts and reply parsing for spam triage.
 */
import type { InboundMessage } from "./types.ts";

export const UNKNOWN_CATEGORY = "Unknown";

function describeMessage(message: InboundMessage): string {
  return [
    `SUBJECT: ${message.subject}`,
    `FROM: ${message.sender ?? ""}`,
    `DATE: ${message.date ?? ""}`,
    "BODY:",
    message.body,
  ].join("\n");
}

export function buildScorePrompt(message: InboundMessage): string {
  return [
    "You are a spam detection expert. Analyze the following email and determine the",
    "probability it is spam. Return ONLY a number between 0 and 100 representing the",
    "percentage probability.",
    "",
    describeMessage(message),
  ].join("\n");
}

export function buildCategoryPrompt(message: InboundMessage): string {
  return [
    "You are a spam detection expert. Classify the following email into a single",
    "category such as Marketing, Phishing, Business, Personal or Scam. Return ONLY",
    "the category name.",
    "",
    describeMessage(message),
  ].join("\n");
}

/**
 * First number in the reply, clamped to 0–100.
 * @returns undefined when the reply holds no number
 */
export function parseScore(reply: string): number | undefined {
  const match = reply.match(/-?\d+(?:\.\d+)?/);
  if (!match) return undefined;
  const value = Number.parseFloat(match[0]);
  if (!Number.isFinite(value)) return undefined;
  return Math.min(100, Math.max(0, value));
}

/** First line of the reply without surrounding punctuation */
export function parseCategory(reply: string): string {
  const firstLine = reply.trim().split("\n")[0] ?? "";
  const cleaned = firstLine.replace(/^[\s"'*.:-]+|[\s"'*.:-]+$/g, "");
  return cleaned || UNKNOWN_CATEGORY;
}
