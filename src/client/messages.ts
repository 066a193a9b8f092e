export type ChatRole = "system" | "user" | "assistant";

export interface ContentPart {
  type: string;
  text?: string;
}

export interface ChatMessage {
  role: ChatRole;
  content: string | ContentPart[];
}

const ROLE_LABELS: Record<ChatRole, string> = {
  system: "System",
  user: "User",
  assistant: "Assistant",
};

export const NON_TEXT_PLACEHOLDER = "[Non-text content]";

function partText(part: ContentPart): string {
  return part.type === "text" && part.text !== undefined ? part.text : NON_TEXT_PLACEHOLDER;
}

/**
 * Flattens a conversation into the single `content` string the backend takes:
 * one `Role: text` line per message.
 */
export function messagesToContent(messages: readonly ChatMessage[]): string {
  return messages
    .map((msg) => {
      const text = typeof msg.content === "string" ? msg.content : msg.content.map(partText).join(" ");
      return `${ROLE_LABELS[msg.role]}: ${text}`;
    })
    .join("\n");
}
