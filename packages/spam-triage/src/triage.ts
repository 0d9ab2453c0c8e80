/**
 * SpamTriage — scores and categorizes inbound messages through a
 * ConversationClient.
 *
 * One session per analyze() run; each message costs two round trips
 * (score, then category). A reply without a number scores 0. A message
 * whose round trip fails gets a zero verdict carrying the error, and the
 * batch moves on.
 */
import {
  createSilentLogger,
  isConversationError,
  type ConversationClient,
  type Logger,
} from "conversation-client";
import {
  UNKNOWN_CATEGORY,
  buildCategoryPrompt,
  buildScorePrompt,
  parseCategory,
  parseScore,
} from "./prompts.ts";
import type { InboundMessage, MessageSource, SpamVerdict } from "./types.ts";

export const DEFAULT_TRIAGE_USER = "spam_detector";

export interface SpamTriageOptions {
  /** User id the triage session is opened for */
  userId?: string;
  /** Model to score with; the backend default when omitted */
  model?: string;
  logger?: Logger;
}

export class SpamTriage {
  private readonly client: ConversationClient;
  private readonly userId: string;
  private readonly model?: string;
  private readonly log: Logger;

  constructor(client: ConversationClient, options: SpamTriageOptions = {}) {
    this.client = client;
    this.userId = options.userId ?? DEFAULT_TRIAGE_USER;
    this.model = options.model;
    this.log = (options.logger ?? createSilentLogger()).child("triage");
  }

  async analyzeSource(source: MessageSource): Promise<SpamVerdict[]> {
    const messages = await source.fetchMessages();
    this.log.info(`Fetched ${messages.length} message(s)`);
    return this.analyze(messages);
  }

  /** Verdicts in input order */
  async analyze(messages: InboundMessage[]): Promise<SpamVerdict[]> {
    if (messages.length === 0) return [];

    const sessionId = await this.client.startNewSession(this.userId, this.model);
    const verdicts: SpamVerdict[] = [];
    try {
      for (const message of messages) {
        verdicts.push(await this.judgeOrRecord(sessionId, message));
      }
    } finally {
      await this.client.endSession(sessionId);
    }

    this.log.info(`Analyzed ${verdicts.length} message(s)`);
    return verdicts;
  }

  private async judgeOrRecord(sessionId: string, message: InboundMessage): Promise<SpamVerdict> {
    try {
      return await this.judge(sessionId, message);
    } catch (error) {
      if (!isConversationError(error)) throw error;
      this.log.error(`Message ${message.id}: analysis failed (${error.code}): ${error.message}`);
      return {
        messageId: message.id,
        subject: message.subject,
        score: 0,
        category: UNKNOWN_CATEGORY,
        error: error.message,
      };
    }
  }

  private async judge(sessionId: string, message: InboundMessage): Promise<SpamVerdict> {
    const scored = await this.client.sendMessage(sessionId, buildScorePrompt(message));
    let score = parseScore(scored.response);
    if (score === undefined) {
      this.log.warn(`Message ${message.id}: no score in reply "${scored.response}", using 0`);
      score = 0;
    }

    const categorized = await this.client.sendMessage(sessionId, buildCategoryPrompt(message));
    const category = parseCategory(categorized.response);

    this.log.debug(`Message ${message.id}: ${score}% (${category})`);
    return { messageId: message.id, subject: message.subject, score, category };
  }
}
