import type { MessageDocument } from "@message-relay/protocol";
import { getMessagesCollection } from "../db/database.js";

/** Persists one document and resolves with its id */
export type SaveMessage = (doc: MessageDocument) => Promise<string>;

export async function saveMessage(doc: MessageDocument): Promise<string> {
  // insertOne adds _id to the object it is given
  const result = await getMessagesCollection().insertOne({ ...doc });
  return result.insertedId.toString();
}
