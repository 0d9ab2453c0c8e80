/**
 * Maps failures raised by the AI SDK transport onto ConversationError.
 *
 * The network backend runs with maxRetries: 0, so whatever fetch or the
 * provider throws arrives here unwrapped.
 */
import {
  APICallError,
  EmptyResponseBodyError,
  InvalidResponseDataError,
  JSONParseError,
  NoContentGeneratedError,
  TypeValidationError,
} from "ai";
import {
  AuthenticationError,
  AuthorizationError,
  CompletionRequestError,
  MalformedResponseError,
  ModelNotFoundError,
  RateLimitError,
  TransientError,
  UpstreamServerError,
  isConversationError,
  type ConversationError,
} from "../errors.ts";

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

function isFetchFailure(error: unknown): boolean {
  return error instanceof TypeError && error.message === "fetch failed";
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function mapTransportError(error: unknown, model: string): ConversationError {
  if (isConversationError(error)) return error;

  if (isTimeout(error)) {
    return new TransientError("Request to completion endpoint timed out", { cause: error });
  }
  if (isFetchFailure(error)) {
    return new TransientError(
      `Failed to connect to completion endpoint: ${messageOf(error)}`,
      { cause: error },
    );
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === undefined) {
      return new TransientError(`Failed to connect to completion endpoint: ${error.message}`, {
        cause: error,
      });
    }
    if (status === 401) {
      return new AuthenticationError("Authentication failed: check the API key", { cause: error });
    }
    if (status === 403) {
      return new AuthorizationError(`Not authorized to use model ${model}`, { cause: error });
    }
    if (status === 404) {
      return new ModelNotFoundError(`Model ${model} not found on completion endpoint`, {
        cause: error,
      });
    }
    if (status === 429) {
      return new RateLimitError("Rate limit exceeded", { cause: error });
    }
    if (status >= 500) {
      return new UpstreamServerError(status, `Completion endpoint server error (${status})`, {
        cause: error,
      });
    }
    if (status < 400) {
      // The request went through but the body could not be used
      return new MalformedResponseError(`Malformed completion response: ${error.message}`, {
        cause: error,
      });
    }
    return new CompletionRequestError(`Completion request failed (${status}): ${error.message}`, {
      cause: error,
    });
  }

  // The endpoint answered, but with no usable reply
  if (
    JSONParseError.isInstance(error) ||
    TypeValidationError.isInstance(error) ||
    InvalidResponseDataError.isInstance(error) ||
    EmptyResponseBodyError.isInstance(error) ||
    NoContentGeneratedError.isInstance(error)
  ) {
    return new MalformedResponseError(`Malformed completion response: ${error.message}`, {
      cause: error,
    });
  }

  return new CompletionRequestError(`Completion request failed: ${messageOf(error)}`, {
    cause: error,
  });
}
