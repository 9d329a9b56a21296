import { MongoClient, type Collection, type Db, type Document } from "mongodb";
import type { RelayConfig } from "../config.js";
import { createLogger } from "../log.js";

const log = createLogger("db");

let client: MongoClient | null = null;
let messages: Collection<Document> | null = null;

export type StorageConfig = Pick<
  RelayConfig,
  "mongoUri" | "mongoTimeoutMs" | "dbName" | "collectionName"
>;

export function getMessagesCollection(): Collection<Document> {
  if (!messages) {
    throw new Error("Database not initialized. Call initDb() first.");
  }
  return messages;
}

/**
 * Connect and ping the server. Rejects when the server cannot be selected
 * within `mongoTimeoutMs`; the client is closed before rethrowing.
 */
export async function initDb(config: StorageConfig): Promise<Db> {
  const candidate = new MongoClient(config.mongoUri, {
    serverSelectionTimeoutMS: config.mongoTimeoutMs,
  });

  try {
    await candidate.db("admin").command({ ping: 1 });
  } catch (err) {
    await candidate.close();
    throw err;
  }

  client = candidate;
  const db = client.db(config.dbName);
  messages = db.collection(config.collectionName);
  log.info(`Connected to MongoDB (${config.dbName}.${config.collectionName})`);
  return db;
}

export async function closeDb(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    messages = null;
  }
}
