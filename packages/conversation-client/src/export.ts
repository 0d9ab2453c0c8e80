/**
 * Chat history export — JSON and plain-text renderings of a session.
 */
import { InvalidArgumentError } from "./errors.ts";
import { EXPORT_FORMATS, type ExportFormat, type MessageSender, type Session } from "./types.ts";

/** Shape of the "json" export */
export interface SessionExport {
  session_id: string;
  user_id: string;
  model: string;
  created_at: string;
  messages: Array<{ id: string; content: string; sender: MessageSender; timestamp: string }>;
}

const SENDER_LABELS: Record<MessageSender, string> = {
  user: "User",
  assistant: "AI",
  system: "System",
};

/** Case-insensitive; throws InvalidArgumentError listing the supported formats */
export function parseExportFormat(format: string): ExportFormat {
  const normalized = format.trim().toLowerCase();
  for (const candidate of EXPORT_FORMATS) {
    if (candidate === normalized) return candidate;
  }
  throw new InvalidArgumentError(
    `Unsupported export format: ${format}. Supported formats: ${EXPORT_FORMATS.join(", ")}`,
  );
}

export function toSessionExport(session: Session): SessionExport {
  return {
    session_id: session.id,
    user_id: session.userId,
    model: session.model,
    created_at: session.createdAt.toISOString(),
    messages: session.messages.map((msg) => ({
      id: msg.id,
      content: msg.content,
      sender: msg.sender,
      timestamp: msg.timestamp.toISOString(),
    })),
  };
}

export function renderJson(session: Session): string {
  return JSON.stringify(toSessionExport(session), null, 2);
}

/** "[HH:MM:SS] Sender: content" lines, times in UTC */
export function renderText(session: Session): string {
  let output = `Session ID: ${session.id}\n`;
  output += `User ID: ${session.userId}\n`;
  output += `Model: ${session.model}\n`;
  output += `Created: ${session.createdAt.toISOString()}\n\n`;
  output += "Conversation:\n\n";

  for (const msg of session.messages) {
    const time = msg.timestamp.toISOString().slice(11, 19);
    output += `[${time}] ${SENDER_LABELS[msg.sender]}: ${msg.content}\n\n`;
  }
  return output;
}

export function renderExport(session: Session, format: ExportFormat): string {
  switch (format) {
    case "json":
      return renderJson(session);
    case "txt":
      return renderText(session);
  }
}
