/**
 * Network backend against an in-process fake of the completion endpoint.
 */
import { describe, test, expect, afterEach, beforeEach, vi } from "vitest";
import {
  CerebrasClient,
  SUMMARY_INSTRUCTION,
  SYSTEM_PROMPT,
  formatTranscript,
} from "../src/backends/cerebras.ts";
import { TestCerebrasClient } from "../src/backends/test-cerebras.ts";
import {
  AuthenticationError,
  AuthorizationError,
  ConversationError,
  InvalidArgumentError,
  MalformedResponseError,
  ModelNotFoundError,
  RateLimitError,
  TransientError,
  UpstreamServerError,
} from "../src/errors.ts";
import {
  completionResponse,
  createFakeFetch,
  errorResponse,
  jsonResponse,
  rawResponse,
  type ScriptedReply,
} from "./helpers/fake-fetch.ts";

beforeEach(() => {
  vi.stubEnv("CEREBRAS_API_KEY", "");
  vi.stubEnv("CEREBRAS_BASE_URL", "");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

// ==================== Credentials ====================

describe("credentials", () => {
  test("fails construction without a key", () => {
    expect(() => new CerebrasClient()).toThrow(InvalidArgumentError);
    expect(() => new CerebrasClient({ apiKey: "   " })).toThrow(
      "Cerebras API key must be provided either as a parameter or via the CEREBRAS_API_KEY environment variable.",
    );
  });

  test("falls back to CEREBRAS_API_KEY", async () => {
    vi.stubEnv("CEREBRAS_API_KEY", "env-secret");
    const fake = createFakeFetch(completionResponse("Hi"));
    const client = new CerebrasClient({ fetch: fake.fetch });
    const sessionId = await client.startNewSession("u1");
    await client.sendMessage(sessionId, "Hello");

    expect(fake.requests[0]?.authorization).toBe("Bearer env-secret");
  });

  test("an explicit key wins over the environment", async () => {
    vi.stubEnv("CEREBRAS_API_KEY", "env-secret");
    const fake = createFakeFetch(completionResponse("Hi"));
    const client = new CerebrasClient({ apiKey: "test-secret", fetch: fake.fetch });
    const sessionId = await client.startNewSession("u1");
    await client.sendMessage(sessionId, "Hello");

    expect(fake.requests[0]?.authorization).toBe("Bearer test-secret");
  });
});

describe("environment", () => {
  test("unrelated invalid variables do not block construction", () => {
    vi.stubEnv("CONVERSATION_LOG_LEVEL", "loud");
    vi.stubEnv("CEREBRAS_BASE_URL", "not a url");

    expect(
      () => new CerebrasClient({ apiKey: "test-secret", baseURL: "http://localhost:9999/v1" }),
    ).not.toThrow();
  });

  test("the test backend ignores an invalid log level", () => {
    vi.stubEnv("CONVERSATION_LOG_LEVEL", "loud");
    expect(() => new TestCerebrasClient()).not.toThrow();
  });

  test("an invalid base URL is reported when it is needed", () => {
    vi.stubEnv("CEREBRAS_BASE_URL", "not a url");
    expect(() => new CerebrasClient({ apiKey: "test-secret" })).toThrow(
      /^Invalid configuration for CEREBRAS_BASE_URL: /,
    );
  });
});

// ==================== Wire format ====================

describe("round trips", () => {
  test("sends the whole history to the chat completions endpoint", async () => {
    const fake = createFakeFetch(completionResponse("Hi there!", 20));
    const client = new CerebrasClient({ apiKey: "test-secret", fetch: fake.fetch });
    const sessionId = await client.startNewSession("u1");

    const result = await client.sendMessage(sessionId, "Hello");
    expect(result.response).toBe("Hi there!");

    const request = fake.requests[0];
    expect(request?.url).toBe("https://api.cerebras.ai/v1/chat/completions");
    expect(request?.body.model).toBe("llama-4-scout-17b-16e-instruct");
    expect(request?.body.max_tokens).toBe(1024);
    expect(request?.body.messages.map(({ role, content }) => ({ role, content }))).toEqual([
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: "Hello" },
    ]);
  });

  test("accrues reported tokens at 0.01 per thousand", async () => {
    const fake = createFakeFetch(completionResponse("Hi there!", 20));
    const client = new CerebrasClient({ apiKey: "test-secret", fetch: fake.fetch });
    const sessionId = await client.startNewSession("u1");
    await client.sendMessage(sessionId, "Hello");

    const metrics = await client.getUsageMetrics(sessionId);
    expect(metrics.tokenCount).toBe(20);
    expect(metrics.apiCalls).toBe(1);
    expect(metrics.costEstimate).toBeCloseTo(0.0002, 10);
  });

  test("later requests carry earlier replies", async () => {
    const fake = createFakeFetch(completionResponse("Hi there!"), completionResponse("Sure."));
    const client = new CerebrasClient({ apiKey: "test-secret", fetch: fake.fetch });
    const sessionId = await client.startNewSession("u1");
    await client.sendMessage(sessionId, "Hello");
    await client.sendMessage(sessionId, "Tell me more");

    expect(fake.requests[1]?.body.messages.map((m) => m.role)).toEqual([
      "system",
      "user",
      "assistant",
      "user",
    ]);
    expect(fake.requests[1]?.body.messages[2]?.content).toBe("Hi there!");
  });

  test("honours a custom base URL", async () => {
    const fake = createFakeFetch(completionResponse("Hi"));
    const client = new CerebrasClient({
      apiKey: "test-secret",
      baseURL: "http://localhost:9999/v1",
      fetch: fake.fetch,
    });
    const sessionId = await client.startNewSession("u1");
    await client.sendMessage(sessionId, "Hello");

    expect(fake.requests[0]?.url).toBe("http://localhost:9999/v1/chat/completions");
  });

  test("uses the model selected with switchModel", async () => {
    const fake = createFakeFetch(completionResponse("Hi"));
    const client = new CerebrasClient({ apiKey: "test-secret", fetch: fake.fetch });
    const sessionId = await client.startNewSession("u1");
    await client.switchModel(sessionId, "llama-3.3-70b");
    await client.sendMessage(sessionId, "Hello");

    expect(fake.requests[0]?.body.model).toBe("llama-3.3-70b");
  });

  test("summarizes with a separate, shorter request", async () => {
    const fake = createFakeFetch(
      completionResponse("Hi there!", 20),
      completionResponse("A greeting.", 15),
    );
    const client = new CerebrasClient({ apiKey: "test-secret", fetch: fake.fetch });
    const sessionId = await client.startNewSession("u1");
    await client.sendMessage(sessionId, "Hello");

    expect(await client.summarizeConversation(sessionId)).toBe("A greeting.");
    const request = fake.requests[1];
    expect(request?.body.max_tokens).toBe(256);
    expect(request?.body.messages.map(({ role, content }) => ({ role, content }))).toEqual([
      { role: "system", content: SUMMARY_INSTRUCTION },
      { role: "user", content: "User: Hello\n\nAI: Hi there!\n\n" },
    ]);

    // The summary is not part of the history
    expect(await client.getChatHistory(sessionId)).toHaveLength(3);
    expect(await client.getUsageMetrics(sessionId)).toMatchObject({ tokenCount: 35, apiCalls: 2 });
  });
});

// ==================== Failures ====================

function timeoutError(): Error {
  return Object.assign(new Error("The operation was aborted due to timeout"), {
    name: "TimeoutError",
  });
}

function connectionError(): Error {
  return new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:443") });
}

const failures: Array<{
  name: string;
  reply: () => ScriptedReply;
  error: new (...args: never[]) => ConversationError;
  message: RegExp;
}> = [
  { name: "401", reply: () => errorResponse(401), error: AuthenticationError, message: /API key/ },
  {
    name: "403",
    reply: () => errorResponse(403),
    error: AuthorizationError,
    message: /Not authorized to use model llama-4-scout-17b-16e-instruct/,
  },
  {
    name: "404",
    reply: () => errorResponse(404),
    error: ModelNotFoundError,
    message: /Model llama-4-scout-17b-16e-instruct not found/,
  },
  { name: "429", reply: () => errorResponse(429), error: RateLimitError, message: /Rate limit/ },
  {
    name: "503",
    reply: () => errorResponse(503),
    error: UpstreamServerError,
    message: /server error \(503\)/,
  },
  {
    name: "non-JSON body",
    reply: () => rawResponse(200, "<html>oops</html>"),
    error: MalformedResponseError,
    message: /Malformed completion response/,
  },
  {
    name: "empty choices",
    reply: () =>
      jsonResponse(200, {
        id: "chatcmpl-test",
        object: "chat.completion",
        created: 1_700_000_000,
        model: "llama-4-scout-17b-16e-instruct",
        choices: [],
        usage: { prompt_tokens: 12, completion_tokens: 0, total_tokens: 12 },
      }),
    error: MalformedResponseError,
    message: /Malformed completion response/,
  },
  {
    name: "missing content",
    reply: () => completionResponse(null),
    error: MalformedResponseError,
    message: /did not include reply content/,
  },
  { name: "timeout", reply: timeoutError, error: TransientError, message: /timed out/ },
  {
    name: "refused connection",
    reply: connectionError,
    error: TransientError,
    message: /Failed to connect/,
  },
];

describe.each(failures)("failure: $name", ({ reply, error, message }) => {
  test("surfaces as a typed error without charging usage", async () => {
    const fake = createFakeFetch(reply());
    const client = new CerebrasClient({ apiKey: "test-secret", fetch: fake.fetch });
    const sessionId = await client.startNewSession("u1");

    const pending = client.sendMessage(sessionId, "Hello");
    await expect(pending).rejects.toBeInstanceOf(error);
    await expect(pending).rejects.toThrow(message);

    expect(fake.requests).toHaveLength(1);
    expect(await client.getUsageMetrics(sessionId)).toEqual({
      tokenCount: 0,
      apiCalls: 0,
      costEstimate: 0,
    });
  });
});

test("a failed round trip keeps the user message in history", async () => {
  const fake = createFakeFetch(errorResponse(503), completionResponse("Back again"));
  const client = new CerebrasClient({ apiKey: "test-secret", fetch: fake.fetch });
  const sessionId = await client.startNewSession("u1");

  await expect(client.sendMessage(sessionId, "Hello")).rejects.toThrow(UpstreamServerError);
  expect((await client.getChatHistory(sessionId)).map((m) => m.sender)).toEqual([
    "system",
    "user",
  ]);

  expect((await client.sendMessage(sessionId, "Hello?")).response).toBe("Back again");
});

// ==================== formatTranscript ====================

describe("formatTranscript", () => {
  test("labels speakers and skips the system prompt", () => {
    const at = new Date("2024-01-01T00:00:00Z");
    expect(
      formatTranscript([
        { id: "1", sender: "system", content: SYSTEM_PROMPT, timestamp: at },
        { id: "2", sender: "user", content: "Hi", timestamp: at },
        { id: "3", sender: "assistant", content: "Hello!", timestamp: at },
      ]),
    ).toBe("User: Hi\n\nAI: Hello!\n\n");
  });
});
