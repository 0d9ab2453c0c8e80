/**
 * SessionStore — in-memory table of sessions owned by one client instance.
 *
 * Sessions are never removed; ending one only flips `active`. Round trips on
 * the same session are serialized through a per-session promise chain so
 * unrelated sessions never wait on each other.
 */
import { randomUUID } from "node:crypto";
import { nanoid } from "nanoid";
import { InvalidArgumentError, SessionNotFoundError } from "./errors.ts";
import type { Attachment, Message, MessageSender, Session, UsageMetrics } from "./types.ts";

export function emptyMetrics(): UsageMetrics {
  return { tokenCount: 0, apiCalls: 0, costEstimate: 0 };
}

export class SessionStore {
  private sessions = new Map<string, Session>();
  /** Tail of each session's pending-operation chain */
  private locks = new Map<string, Promise<void>>();

  create(userId: string, model: string): Session {
    let id = randomUUID();
    while (this.sessions.has(id)) id = randomUUID();

    const session: Session = {
      id,
      userId,
      model,
      active: true,
      createdAt: new Date(),
      messages: [],
      attachments: [],
    };
    this.sessions.set(id, session);
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** @throws SessionNotFoundError */
  get(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  /** Like get(), but also rejects ended sessions */
  getActive(sessionId: string): Session {
    const session = this.get(sessionId);
    if (!session.active) {
      throw new InvalidArgumentError(`Session ${sessionId} is not active`);
    }
    return session;
  }

  append(session: Session, sender: MessageSender, content: string): Message {
    const message: Message = {
      id: nanoid(),
      content,
      sender,
      timestamp: new Date(),
    };
    session.messages.push(message);
    return message;
  }

  /** Most recent `limit` messages, oldest first */
  history(session: Session, limit?: number): Message[] {
    if (limit === undefined) return [...session.messages];
    if (!Number.isInteger(limit) || limit < 0) {
      throw new InvalidArgumentError(`Invalid history limit: ${limit}`);
    }
    if (limit === 0) return [];
    return session.messages.slice(-limit);
  }

  recordUsage(session: Session, tokens: number, unitPrice: number): UsageMetrics {
    const metrics = session.metrics ?? emptyMetrics();
    metrics.tokenCount += tokens;
    metrics.apiCalls += 1;
    metrics.costEstimate += (tokens / 1000) * unitPrice;
    session.metrics = metrics;
    return { ...metrics };
  }

  metrics(session: Session): UsageMetrics {
    return session.metrics ? { ...session.metrics } : emptyMetrics();
  }

  attach(session: Session, path: string, description?: string): Attachment {
    const attachment: Attachment = { path, description, attachedAt: new Date() };
    session.attachments.push(attachment);
    return attachment;
  }

  /** @returns false when the session does not exist */
  end(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.active = false;
    return true;
  }

  /**
   * Run `task` after every earlier task queued for the same session.
   * A failing task does not poison the chain for later callers.
   */
  async withLock<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(sessionId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.locks.get(sessionId) === tail) {
        this.locks.delete(sessionId);
      }
    }
  }
}
