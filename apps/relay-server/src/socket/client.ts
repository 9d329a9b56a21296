import net from "node:net";
import { encodeMessage, type Message } from "@message-relay/protocol";

export interface SocketAddress {
  host: string;
  port: number;
}

/**
 * Deliver one message: connect, write once, close. Resolves as soon as the
 * payload and FIN are flushed; the listener's handling is not awaited.
 */
export function sendMessage(target: SocketAddress, message: Message): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: target.host, port: target.port });

    socket.once("error", reject);
    socket.once("connect", () => {
      socket.end(encodeMessage(message), () => {
        socket.destroy();
        resolve();
      });
    });
  });
}
