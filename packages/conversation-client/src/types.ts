/**
 * Conversation client contract.
 *
 * Every backend (network, deterministic test, scripted mock) implements
 * ConversationClient. Callers resolve one by name through the registry
 * and never depend on a concrete class.
 */

// ── Messages & Sessions ───────────────────────────────────────────

export type MessageSender = "user" | "assistant" | "system";

/** A single history entry. Never mutated once appended. */
export interface Message {
  readonly id: string;
  readonly content: string;
  readonly sender: MessageSender;
  readonly timestamp: Date;
}

/** Cumulative per-session accounting */
export interface UsageMetrics {
  tokenCount: number;
  apiCalls: number;
  costEstimate: number;
}

export interface Attachment {
  path: string;
  description?: string;
  attachedAt: Date;
}

/**
 * Session record owned by a SessionStore.
 * `messages` is append-only; its order is the conversation order sent to the model.
 */
export interface Session {
  readonly id: string;
  readonly userId: string;
  model: string;
  active: boolean;
  readonly createdAt: Date;
  readonly messages: Message[];
  /** Created on the first usage-incurring call */
  metrics?: UsageMetrics;
  readonly attachments: Attachment[];
}

// ── Models ────────────────────────────────────────────────────────

export interface ModelDescriptor {
  id: string;
  name: string;
  capabilities: string[];
  /** Context length ceiling in tokens */
  maxTokens: number;
  knowledgeCutoff?: string;
  /** Restricted availability */
  privatePreview?: boolean;
}

// ── Operation results ─────────────────────────────────────────────

export interface SendMessageResult {
  response: string;
  /** Files produced by the backend (none of the bundled backends produce any) */
  attachments: string[];
  timestamp: Date;
}

/** A scripted reply for the deterministic backends, optionally with its token count */
export type CannedResponse = string | { response: string; tokens?: number };

export const EXPORT_FORMATS = ["json", "txt"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

/** Returned by summarizeConversation when there is nothing worth summarizing */
export const NOT_ENOUGH_CONVERSATION = "Not enough conversation to summarize.";

// ── Contract ──────────────────────────────────────────────────────

export interface ConversationClient {
  /** Registry name of the backend, e.g. "cerebras" */
  readonly backend: string;

  startNewSession(userId: string, model?: string): Promise<string>;

  sendMessage(
    sessionId: string,
    message: string,
    attachments?: string[],
  ): Promise<SendMessageResult>;

  getChatHistory(sessionId: string, limit?: number): Promise<Message[]>;

  /** Soft-fail: false when the session is unknown, never throws for that */
  endSession(sessionId: string): Promise<boolean>;

  listAvailableModels(): ModelDescriptor[];

  switchModel(sessionId: string, modelId: string): Promise<boolean>;

  attachFile(sessionId: string, filePath: string, description?: string): Promise<boolean>;

  getUsageMetrics(sessionId: string): Promise<UsageMetrics>;

  /** Returns NOT_ENOUGH_CONVERSATION for histories shorter than two messages */
  summarizeConversation(sessionId: string): Promise<string>;

  exportChatHistory(sessionId: string, format?: string): Promise<string>;
}
