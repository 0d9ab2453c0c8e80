/**
 * Cerebras backend — network-backed conversation client.
 *
 * Talks to the Cerebras chat-completions endpoint (OpenAI wire format)
 * through the Vercel AI SDK. Every send submits the whole session history,
 * oldest first, starting with the system priming message.
 */
import { generateText, type ModelMessage } from "ai";
import { createOpenAICompatible, type OpenAICompatibleProvider } from "@ai-sdk/openai-compatible";
import { BaseConversationClient, type ClientOptions, type Completion } from "../client.ts";
import { readApiKey, readBaseURL } from "../config.ts";
import { InvalidArgumentError, MalformedResponseError } from "../errors.ts";
import type { Message, ModelDescriptor, Session } from "../types.ts";
import { mapTransportError } from "./transport-errors.ts";

export const CEREBRAS_MODELS: readonly ModelDescriptor[] = [
  {
    id: "llama-4-scout-17b-16e-instruct",
    name: "Llama 4 Scout",
    capabilities: ["text-generation", "chat"],
    maxTokens: 8192,
    knowledgeCutoff: "August 2024",
  },
  {
    id: "llama3.1-8b",
    name: "Llama 3.1 8B",
    capabilities: ["text-generation", "chat"],
    maxTokens: 8192,
    knowledgeCutoff: "March 2023",
  },
  {
    id: "llama-3.3-70b",
    name: "Llama 3.3 70B",
    capabilities: ["text-generation", "chat"],
    maxTokens: 8192,
    knowledgeCutoff: "December 2023",
  },
  {
    id: "deepseek-r1-distill-llama-70b",
    name: "DeepSeek R1 Distill Llama 70B",
    capabilities: ["text-generation", "chat"],
    maxTokens: 8192,
    knowledgeCutoff: "December 2023",
    privatePreview: true,
  },
];

export const DEFAULT_CEREBRAS_MODEL = "llama-4-scout-17b-16e-instruct";

/** Seeded as the first history entry of every session */
export const SYSTEM_PROMPT = "You are a helpful assistant. Answer clearly and concisely.";

export const SUMMARY_INSTRUCTION = "Please provide a concise summary of the following conversation:";

const REPLY_MAX_TOKENS = 1024;
const SUMMARY_MAX_TOKENS = 256;
const REQUEST_TIMEOUT_MS = 30_000;
const PRICE_PER_1K_TOKENS = 0.01;

export interface CerebrasClientOptions extends ClientOptions {
  /** Falls back to CEREBRAS_API_KEY */
  apiKey?: string;
  /** Falls back to CEREBRAS_BASE_URL, then the public endpoint */
  baseURL?: string;
  /** Transport override, e.g. an in-process stand-in for tests */
  fetch?: typeof globalThis.fetch;
}

/** One request to the completion endpoint */
export interface CompletionRequest {
  purpose: "reply" | "summary";
  model: string;
  messages: ModelMessage[];
  maxTokens: number;
}

function toModelMessage(msg: Message): ModelMessage {
  switch (msg.sender) {
    case "system":
      return { role: "system", content: msg.content };
    case "user":
      return { role: "user", content: msg.content };
    case "assistant":
      return { role: "assistant", content: msg.content };
  }
}

/** "User: …" / "AI: …" blocks; the priming message is not part of the conversation */
export function formatTranscript(messages: readonly Message[]): string {
  let text = "";
  for (const msg of messages) {
    if (msg.sender === "system") continue;
    const sender = msg.sender === "user" ? "User" : "AI";
    text += `${sender}: ${msg.content}\n\n`;
  }
  return text;
}

export class CerebrasClient extends BaseConversationClient {
  readonly backend: string = "cerebras";

  protected readonly models = CEREBRAS_MODELS;
  protected readonly defaultModel = DEFAULT_CEREBRAS_MODEL;
  protected readonly unitPrice = PRICE_PER_1K_TOKENS;

  private readonly provider: OpenAICompatibleProvider;

  constructor(options: CerebrasClientOptions = {}) {
    super(options, "cerebras");
    // The environment is consulted only for what the options leave out
    const apiKey = options.apiKey?.trim() || readApiKey();
    if (!apiKey) {
      throw new InvalidArgumentError(
        "Cerebras API key must be provided either as a parameter or via the CEREBRAS_API_KEY environment variable.",
      );
    }

    this.provider = createOpenAICompatible({
      name: "cerebras",
      baseURL: options.baseURL ?? readBaseURL(),
      apiKey,
      fetch: options.fetch,
    });
  }

  protected onSessionCreated(session: Session): void {
    this.sessions.append(session, "system", SYSTEM_PROMPT);
  }

  protected reply(session: Session): Promise<Completion> {
    return this.complete({
      purpose: "reply",
      model: session.model,
      messages: session.messages.map(toModelMessage),
      maxTokens: REPLY_MAX_TOKENS,
    });
  }

  protected summarize(session: Session): Promise<Completion> {
    return this.complete({
      purpose: "summary",
      model: session.model,
      messages: [
        { role: "system", content: SUMMARY_INSTRUCTION },
        { role: "user", content: formatTranscript(session.messages) },
      ],
      maxTokens: SUMMARY_MAX_TOKENS,
    });
  }

  /**
   * One round trip to the completion endpoint. No retries here; every
   * failure surfaces as a ConversationError.
   */
  protected async complete(request: CompletionRequest): Promise<Completion> {
    try {
      const result = await generateText({
        model: this.provider.chatModel(request.model),
        messages: request.messages,
        maxOutputTokens: request.maxTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });

      if (!result.text) {
        throw new MalformedResponseError("Completion response did not include reply content");
      }

      const total = result.usage.totalTokens;
      const tokens = typeof total === "number" && Number.isFinite(total) ? total : undefined;
      this.log.debug(`${request.purpose} on ${request.model}: ${tokens ?? "unreported"} tokens`);
      return { content: result.text, tokens };
    } catch (error) {
      const mapped = mapTransportError(error, request.model);
      this.log.warn(`${request.purpose} request failed (${mapped.code}): ${mapped.message}`);
      throw mapped;
    }
  }
}
