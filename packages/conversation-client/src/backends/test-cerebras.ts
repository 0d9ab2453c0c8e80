/**
 * Test backend — CerebrasClient with the round trip replaced by canned text.
 *
 * Session bookkeeping, system priming, validation and usage accrual all run
 * through the real network backend; only complete() is overridden.
 */
import type { Completion } from "../client.ts";
import type { CannedResponse } from "../types.ts";
import {
  CerebrasClient,
  type CerebrasClientOptions,
  type CompletionRequest,
} from "./cerebras.ts";

export const TEST_DEFAULT_RESPONSE = "This is a default test response.";
export const TEST_SUMMARY = "This is a test summary of the conversation.";
export const TEST_SPAM_PROBABILITY = "75";
export const TEST_SPAM_CATEGORY = "Marketing";

const TOKENS_PER_REPLY = 25;
const TOKENS_PER_SUMMARY = 30;

export interface TestCerebrasClientOptions extends CerebrasClientOptions {
  /** Replies consumed in order, one per sendMessage */
  responses?: CannedResponse[];
}

function lastUserContent(request: CompletionRequest): string {
  for (let i = request.messages.length - 1; i >= 0; i--) {
    const msg = request.messages[i];
    if (msg?.role === "user" && typeof msg.content === "string") return msg.content;
  }
  return "";
}

export class TestCerebrasClient extends CerebrasClient {
  readonly backend: string = "test";

  private queue: CannedResponse[];
  /** Every request that would have gone over the wire */
  readonly requests: CompletionRequest[] = [];

  constructor(options: TestCerebrasClientOptions = {}) {
    super({ ...options, apiKey: options.apiKey ?? "test-api-key" });
    this.queue = [...(options.responses ?? [])];
  }

  /** Replace the pending canned replies */
  configureResponses(responses: CannedResponse[]): void {
    this.queue = [...responses];
  }

  protected async complete(request: CompletionRequest): Promise<Completion> {
    this.requests.push(request);

    if (request.purpose === "summary") {
      return { content: TEST_SUMMARY, tokens: TOKENS_PER_SUMMARY };
    }

    const canned = this.queue.shift();
    if (canned !== undefined) {
      return typeof canned === "string"
        ? { content: canned, tokens: TOKENS_PER_REPLY }
        : { content: canned.response, tokens: canned.tokens ?? TOKENS_PER_REPLY };
    }

    const prompt = lastUserContent(request).toLowerCase();
    if (prompt.includes("spam") && prompt.includes("probability")) {
      return { content: TEST_SPAM_PROBABILITY, tokens: TOKENS_PER_REPLY };
    }
    if (prompt.includes("spam") && prompt.includes("category")) {
      return { content: TEST_SPAM_CATEGORY, tokens: TOKENS_PER_REPLY };
    }
    return { content: TEST_DEFAULT_RESPONSE, tokens: TOKENS_PER_REPLY };
  }
}
