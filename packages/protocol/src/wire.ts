import type { Message } from "./messages.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PayloadError";
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Encode a message as a UTF-8 JSON object. Only the message fields are sent. */
export function encodeMessage(message: Message): Uint8Array {
  return encoder.encode(
    JSON.stringify({ username: message.username, message: message.message })
  );
}

/** Decode one payload received from the TCP hop. Throws PayloadError. */
export function decodePayload(bytes: Uint8Array): Record<string, unknown> {
  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch {
    throw new PayloadError("Payload is not valid UTF-8");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PayloadError(`Payload is not valid JSON: ${reason}`);
  }

  if (!isJsonObject(parsed)) {
    throw new PayloadError("Payload is not a JSON object");
  }
  return parsed;
}
