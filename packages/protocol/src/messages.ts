/** A message as submitted through the form and sent over the TCP hop */
export interface Message {
  username: string;
  message: string;
}

/** Fields that must be non-empty before a message leaves the HTTP front */
export const REQUIRED_FIELDS = ["username", "message"] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/**
 * A stored message. The listener persists whatever object it parsed,
 * so fields beyond `username` and `message` may be present.
 */
export type MessageDocument = Record<string, unknown> & {
  /** Receipt time at the socket listener */
  date: Date;
};

/** Names of required fields that are empty, in declaration order */
export function missingFields(message: Message): RequiredField[] {
  return REQUIRED_FIELDS.filter((field) => message[field] === "");
}

/** Attach the receipt timestamp. A sender-supplied `date` is replaced. */
export function stampMessage(
  payload: Record<string, unknown>,
  receivedAt: Date
): MessageDocument {
  return { ...payload, date: receivedAt };
}
