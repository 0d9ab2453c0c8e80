export { BaseConversationClient } from "./client.ts";
export type { ClientOptions, Completion } from "./client.ts";
export {
  createLoggerFromEnv,
  loadConfig,
  readApiKey,
  readBaseURL,
  DEFAULT_CEREBRAS_BASE_URL,
} from "./config.ts";
export type { ClientConfig } from "./config.ts";
export * from "./errors.ts";
export { parseExportFormat, renderExport, renderJson, renderText, toSessionExport } from "./export.ts";
export type { SessionExport } from "./export.ts";
export { createConsoleLogger, createSilentLogger } from "./logger.ts";
export type { Logger, LogLevel, LogSink } from "./logger.ts";
export { ClientFactory, ClientRegistry, createClient, createDefaultRegistry } from "./registry.ts";
export type { ClientConstructor } from "./registry.ts";
export { SessionStore, emptyMetrics } from "./session-store.ts";
export { EXPORT_FORMATS, NOT_ENOUGH_CONVERSATION } from "./types.ts";
export type {
  Attachment,
  CannedResponse,
  ConversationClient,
  ExportFormat,
  Message,
  MessageSender,
  ModelDescriptor,
  SendMessageResult,
  Session,
  UsageMetrics,
} from "./types.ts";

export {
  CEREBRAS_MODELS,
  CerebrasClient,
  DEFAULT_CEREBRAS_MODEL,
  SUMMARY_INSTRUCTION,
  SYSTEM_PROMPT,
  formatTranscript,
} from "./backends/cerebras.ts";
export type { CerebrasClientOptions, CompletionRequest } from "./backends/cerebras.ts";
export { MOCK_MODELS, MOCK_RESPONSES, MockConversationClient, countWords } from "./backends/mock.ts";
export type { MockClientOptions } from "./backends/mock.ts";
export {
  TEST_DEFAULT_RESPONSE,
  TEST_SPAM_CATEGORY,
  TEST_SPAM_PROBABILITY,
  TEST_SUMMARY,
  TestCerebrasClient,
} from "./backends/test-cerebras.ts";
export type { TestCerebrasClientOptions } from "./backends/test-cerebras.ts";
export { mapTransportError } from "./backends/transport-errors.ts";
