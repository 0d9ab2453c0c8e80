/**
 * BaseConversationClient — shared session bookkeeping for every backend.
 *
 * Validation, history, usage accrual and exports live here; a backend
 * only supplies its model catalog and the two round trips (reply and
 * summary). Backends that accept attachments override acceptAttachment().
 */
import { existsSync } from "node:fs";
import { InvalidArgumentError, MissingResourceError, UnsupportedOperationError } from "./errors.ts";
import { parseExportFormat, renderExport } from "./export.ts";
import { createSilentLogger, type Logger } from "./logger.ts";
import { SessionStore } from "./session-store.ts";
import {
  NOT_ENOUGH_CONVERSATION,
  type ConversationClient,
  type Message,
  type ModelDescriptor,
  type SendMessageResult,
  type Session,
  type UsageMetrics,
} from "./types.ts";

/**
 * Construction options shared by all backends.
 * Backend-specific options extend this; the factory forwards unknown keys untouched.
 */
export interface ClientOptions {
  logger?: Logger;
  [option: string]: unknown;
}

/** Result of one round trip to whatever produces replies */
export interface Completion {
  content: string;
  /** Total tokens reported for the call; undefined when nothing was reported */
  tokens?: number;
}

function requireText(value: string, label: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidArgumentError(`${label} cannot be empty`);
  }
}

export abstract class BaseConversationClient implements ConversationClient {
  abstract readonly backend: string;

  protected readonly sessions = new SessionStore();
  protected readonly log: Logger;

  protected abstract readonly models: readonly ModelDescriptor[];
  protected abstract readonly defaultModel: string;
  /** Cost per 1000 tokens */
  protected abstract readonly unitPrice: number;

  constructor(options: ClientOptions, scope: string) {
    this.log = (options.logger ?? createSilentLogger()).child(scope);
  }

  // ── Backend hooks ───────────────────────────────────────────────

  /** Produce the assistant reply; `message` is already the last history entry */
  protected abstract reply(session: Session, message: string): Promise<Completion>;

  /** Summarize a history of at least two messages */
  protected abstract summarize(session: Session): Promise<Completion>;

  /** Called once, right after a session is created */
  protected onSessionCreated(_session: Session): void {}

  protected acceptAttachment(_session: Session, _filePath: string, _description?: string): boolean {
    throw new UnsupportedOperationError("File attachment not yet implemented");
  }

  // ── Sessions ────────────────────────────────────────────────────

  async startNewSession(userId: string, model?: string): Promise<string> {
    requireText(userId, "User ID");
    const resolved = model === undefined || model.trim() === "" ? this.defaultModel : model;
    this.assertKnownModel(resolved);

    const session = this.sessions.create(userId, resolved);
    this.onSessionCreated(session);
    this.log.info(`Session ${session.id} started for ${userId} on ${resolved}`);
    return session.id;
  }

  async endSession(sessionId: string): Promise<boolean> {
    const ended = this.sessions.end(sessionId);
    if (ended) this.log.info(`Session ${sessionId} ended`);
    return ended;
  }

  // ── Messaging ───────────────────────────────────────────────────

  async sendMessage(
    sessionId: string,
    message: string,
    attachments: string[] = [],
  ): Promise<SendMessageResult> {
    requireText(sessionId, "Session ID");
    requireText(message, "Message");
    const session = this.sessions.getActive(sessionId);
    for (const path of attachments) {
      if (!existsSync(path)) {
        throw new InvalidArgumentError(`Attachment not found: ${path}`);
      }
    }

    return this.sessions.withLock(sessionId, async () => {
      // The session may have ended while this call was queued
      this.sessions.getActive(sessionId);
      this.sessions.append(session, "user", message);

      const completion = await this.reply(session, message);
      const answer = this.sessions.append(session, "assistant", completion.content);
      this.accrue(session, completion);

      return { response: completion.content, attachments: [], timestamp: answer.timestamp };
    });
  }

  async getChatHistory(sessionId: string, limit?: number): Promise<Message[]> {
    return this.sessions.history(this.sessions.get(sessionId), limit);
  }

  async summarizeConversation(sessionId: string): Promise<string> {
    const session = this.sessions.get(sessionId);
    if (session.messages.length < 2) return NOT_ENOUGH_CONVERSATION;

    return this.sessions.withLock(sessionId, async () => {
      const completion = await this.summarize(session);
      this.accrue(session, completion);
      return completion.content;
    });
  }

  async exportChatHistory(sessionId: string, format = "json"): Promise<string> {
    const session = this.sessions.get(sessionId);
    return renderExport(session, parseExportFormat(format));
  }

  // ── Models ──────────────────────────────────────────────────────

  listAvailableModels(): ModelDescriptor[] {
    return this.models.map((model) => ({ ...model, capabilities: [...model.capabilities] }));
  }

  async switchModel(sessionId: string, modelId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    this.assertKnownModel(modelId);
    const previous = session.model;
    session.model = modelId;
    this.log.info(`Session ${sessionId} switched from ${previous} to ${modelId}`);
    return true;
  }

  // ── Attachments & usage ─────────────────────────────────────────

  async attachFile(sessionId: string, filePath: string, description?: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!existsSync(filePath)) throw new MissingResourceError(filePath);
    return this.acceptAttachment(session, filePath, description);
  }

  async getUsageMetrics(sessionId: string): Promise<UsageMetrics> {
    return this.sessions.metrics(this.sessions.get(sessionId));
  }

  // ── Internals ───────────────────────────────────────────────────

  private assertKnownModel(modelId: string): void {
    if (this.models.some((model) => model.id === modelId)) return;
    const available = this.models.map((model) => model.id).join(", ");
    throw new InvalidArgumentError(
      `Model ${modelId} is not available. Available models: ${available}`,
    );
  }

  private accrue(session: Session, completion: Completion): void {
    if (completion.tokens === undefined) return;
    const metrics = this.sessions.recordUsage(session, completion.tokens, this.unitPrice);
    this.log.debug(
      `Session ${session.id}: +${completion.tokens} tokens (total ${metrics.tokenCount}, calls ${metrics.apiCalls})`,
    );
  }
}
