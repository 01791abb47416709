import type { Message, WireMessage } from "./base";

/** Keeps conversation order; `name` and `metadata` are not part of the wire contract. */
export function formatMessages(messages: readonly Message[]): WireMessage[] {
  return messages.map((msg) => ({ role: msg.role, content: msg.content }));
}
