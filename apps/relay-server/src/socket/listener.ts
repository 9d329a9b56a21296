import net, { type AddressInfo, type Socket } from "node:net";
import { decodePayload, stampMessage } from "@message-relay/protocol";
import type { SaveMessage } from "../messages/store.js";
import { createLogger, errorMessage } from "../log.js";

const log = createLogger("socket");

export interface SocketListenerOptions {
  host: string;
  port: number;
  /** Bytes read from one connection before the rest is dropped */
  maxPayloadBytes: number;
  saveMessage: SaveMessage;
  /** Receipt clock, injectable for tests */
  now?: () => Date;
}

export interface SocketListener {
  address(): AddressInfo;
  close(): Promise<void>;
}

interface ReadResult {
  payload: Buffer;
  truncated: boolean;
}

function describePeer(socket: Socket): string {
  return `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? "?"}`;
}

/**
 * Collect one payload: everything the peer sends until it ends its side,
 * or the first `limit` bytes if it sends more.
 */
function readPayload(socket: Socket, limit: number): Promise<ReadResult> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const cleanup = () => {
      socket.off("data", onData);
      socket.off("end", onEnd);
      socket.off("error", onError);
    };
    const finish = (truncated: boolean) => {
      cleanup();
      resolve({ payload: Buffer.concat(chunks, Math.min(size, limit)), truncated });
    };
    const onData = (chunk: Buffer) => {
      chunks.push(chunk);
      size += chunk.length;
      if (size >= limit) {
        socket.pause();
        finish(size > limit);
      }
    };
    const onEnd = () => finish(false);
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    socket.on("data", onData);
    socket.once("end", onEnd);
    socket.once("error", onError);
  });
}

/**
 * Read, parse, stamp and store one message, then close the connection.
 * Never rejects: every failure is logged.
 */
export async function handleSocketConnection(
  socket: Socket,
  options: Pick<SocketListenerOptions, "maxPayloadBytes" | "saveMessage" | "now">
): Promise<void> {
  const peer = describePeer(socket);
  const now = options.now ?? (() => new Date());

  try {
    const { payload, truncated } = await readPayload(socket, options.maxPayloadBytes);
    if (truncated) {
      log.warn(`Payload from ${peer} exceeds ${options.maxPayloadBytes} bytes, extra data dropped`);
    }
    if (payload.length === 0) {
      log.debug(`Connection from ${peer} closed without a payload`);
      return;
    }

    const doc = stampMessage(decodePayload(payload), now());
    try {
      const id = await options.saveMessage(doc);
      log.info(`Stored message ${id} from ${peer}`);
    } catch (err) {
      log.error(`Failed to store message from ${peer}: ${errorMessage(err)}`);
    }
  } catch (err) {
    log.error(`Error handling connection from ${peer}: ${errorMessage(err)}`);
  } finally {
    socket.destroy();
  }
}

export function startSocketListener(options: SocketListenerOptions): Promise<SocketListener> {
  // Half-open so the connection stays up until the handler has stored the message
  const server = net.createServer({ allowHalfOpen: true }, (socket) => {
    void handleSocketConnection(socket, options);
  });

  const listener: SocketListener = {
    address() {
      const address = server.address();
      if (address === null || typeof address === "string") {
        throw new Error("Socket listener is not bound to a TCP address");
      }
      return address;
    },
    close() {
      return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      server.on("error", (err) => {
        log.error(`Listener error: ${err.message}`);
      });
      resolve(listener);
    });
  });
}
