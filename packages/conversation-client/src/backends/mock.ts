/**
 * Mock backend — scripted responses for testing, no network and no priming.
 *
 * Reply order: queued canned responses (FIFO), then per-message custom
 * responses, then a rotating pool of fixed strings.
 */
import { BaseConversationClient, type ClientOptions, type Completion } from "../client.ts";
import type { CannedResponse, ModelDescriptor, Session } from "../types.ts";

export const MOCK_RESPONSES = [
  "I'm a mock AI assistant helping you test your code.",
  "This is a test response from the mock AI system.",
  "Your test is working correctly if you see this message.",
  "Mock AI systems are useful for testing without API costs.",
  "This is a simulated response that doesn't use a real AI API.",
] as const;

export const MOCK_MODELS: readonly ModelDescriptor[] = [
  {
    id: "mock-gpt-4",
    name: "Mock GPT-4",
    capabilities: ["text-generation", "chat"],
    maxTokens: 8192,
  },
  {
    id: "mock-gpt-3",
    name: "Mock GPT-3.5",
    capabilities: ["text-generation", "chat"],
    maxTokens: 4096,
  },
  {
    id: "mock-small",
    name: "Mock Small Model",
    capabilities: ["text-generation"],
    maxTokens: 2048,
  },
];

export interface MockClientOptions extends ClientOptions {
  /** Replies consumed in order, one per sendMessage */
  responses?: CannedResponse[];
}

/** Whitespace-separated word count, the mock's stand-in for tokens */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export class MockConversationClient extends BaseConversationClient {
  readonly backend: string = "mock";

  protected readonly models = MOCK_MODELS;
  protected readonly defaultModel = "mock-gpt-4";
  protected readonly unitPrice = 0.1;

  private queue: CannedResponse[];
  private customResponses = new Map<string, string>();
  private poolIndex = 0;

  constructor(options: MockClientOptions = {}) {
    super(options, "mock");
    this.queue = [...(options.responses ?? [])];
  }

  /** Append replies to the FIFO queue */
  queueResponses(...responses: CannedResponse[]): void {
    this.queue.push(...responses);
  }

  /** Always answer `message` with `response` (once the queue is empty) */
  setCustomResponse(message: string, response: string): void {
    this.customResponses.set(message, response);
  }

  protected async reply(_session: Session, message: string): Promise<Completion> {
    const canned = this.queue.shift();
    if (canned !== undefined) {
      const content = typeof canned === "string" ? canned : canned.response;
      const tokens =
        typeof canned === "string" || canned.tokens === undefined
          ? countWords(message) + countWords(content)
          : canned.tokens;
      return { content, tokens };
    }

    const custom = this.customResponses.get(message);
    const content = custom ?? MOCK_RESPONSES[this.poolIndex % MOCK_RESPONSES.length] ?? "";
    if (custom === undefined) {
      this.poolIndex = (this.poolIndex + 1) % MOCK_RESPONSES.length;
    }
    return { content, tokens: countWords(message) + countWords(content) };
  }

  protected async summarize(session: Session): Promise<Completion> {
    const userMessages = session.messages.filter((msg) => msg.sender === "user");
    const replies = session.messages.filter((msg) => msg.sender === "assistant").length;
    const topics = userMessages.slice(0, 2).map((msg) => msg.content);
    const content =
      `This conversation contains ${userMessages.length} user messages and ` +
      `${replies} AI responses. The user asked about: ${topics.join(", ")}...`;
    return { content, tokens: countWords(content) };
  }

  protected acceptAttachment(session: Session, filePath: string, description?: string): boolean {
    this.sessions.attach(session, filePath, description);
    this.log.debug(`Attached ${filePath} to session ${session.id}`);
    return true;
  }
}
