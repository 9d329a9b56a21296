import type { RelayConfig } from "./config.js";
import { buildHttpFront } from "./http/front.js";
import { startSocketListener } from "./socket/listener.js";
import { sendMessage } from "./socket/client.js";
import { initDb, closeDb } from "./db/database.js";
import { saveMessage, type SaveMessage } from "./messages/store.js";
import { createLogger, errorMessage, type Logger } from "./log.js";

export const UNIT_NAMES = ["http", "socket"] as const;

export type UnitName = (typeof UNIT_NAMES)[number];

/** An independently scheduled part of the relay. `run` settles when it stops. */
export interface Unit {
  readonly name: UnitName;
  run(): Promise<void>;
}

export class StorageUnavailableError extends Error {
  constructor(target: string, cause: unknown) {
    super(`Storage ${target} is unreachable: ${errorMessage(cause)}`, { cause });
    this.name = "StorageUnavailableError";
  }
}

/** How the socket unit reaches its store */
export interface SocketUnitStorage {
  connect(config: RelayConfig): Promise<SaveMessage>;
  disconnect(): Promise<void>;
}

export const mongoStorage: SocketUnitStorage = {
  async connect(config) {
    await initDb(config);
    return saveMessage;
  },
  disconnect: closeDb,
};

export function isUnitName(value: string): value is UnitName {
  return UNIT_NAMES.some((name) => name === value);
}

/** Resolves on the first SIGINT or SIGTERM; later ones are logged and ignored. */
export function untilShutdownSignal(log: Logger): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    let received = false;
    const onSignal = (signal: NodeJS.Signals) => {
      if (received) {
        log.warn(`Received ${signal}, already shutting down`);
        return;
      }
      received = true;
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export function createHttpUnit(config: RelayConfig): Unit {
  const log = createLogger("http");
  return {
    name: "http",
    async run() {
      const app = await buildHttpFront({
        pagesDir: config.pagesDir,
        staticDir: config.staticDir,
        deliver: (message) =>
          sendMessage({ host: config.socketHost, port: config.socketPort }, message),
      });

      await app.listen({ host: config.httpHost, port: config.httpPort });
      log.info(`HTTP server listening on ${config.httpHost}:${config.httpPort}`);

      const signal = await untilShutdownSignal(log);
      log.info(`Received ${signal}, shutting down`);
      await app.close();
    },
  };
}

export function createSocketUnit(
  config: RelayConfig,
  storage: SocketUnitStorage = mongoStorage,
  waitForShutdown: (log: Logger) => Promise<NodeJS.Signals> = untilShutdownSignal
): Unit {
  const log = createLogger("socket");
  return {
    name: "socket",
    async run() {
      let store: SaveMessage;
      try {
        store = await storage.connect(config);
      } catch (err) {
        throw new StorageUnavailableError(`${config.dbName}.${config.collectionName}`, err);
      }

      try {
        const listener = await startSocketListener({
          host: config.socketHost,
          port: config.socketPort,
          maxPayloadBytes: config.socketBufferSize,
          saveMessage: store,
        });
        const { address, port } = listener.address();
        log.info(`Socket server listening on ${address}:${port}`);

        const signal = await waitForShutdown(log);
        log.info(`Received ${signal}, shutting down`);
        await listener.close();
      } finally {
        await storage.disconnect();
      }
    },
  };
}

export function createUnit(name: UnitName, config: RelayConfig): Unit {
  switch (name) {
    case "http":
      return createHttpUnit(config);
    case "socket":
      return createSocketUnit(config);
  }
}
