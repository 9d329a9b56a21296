import type { FastifyInstance, FastifyRequest } from "fastify";
import querystring from "fast-querystring";
import { missingFields, type Message } from "@message-relay/protocol";
import { sendErrorPage, type PageOptions } from "./pages.js";
import { createLogger, errorMessage } from "../log.js";

const log = createLogger("http");

/** Hands a validated message to the socket listener */
export type DeliverMessage = (message: Message) => Promise<void>;

/** First value of a form field, or "" when absent */
export function formField(body: unknown, name: string): string {
  if (typeof body !== "object" || body === null) return "";
  const value: unknown = Reflect.get(body, name);
  if (typeof value === "string") return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return "";
}

/** Decode a request body as URL-encoded form data */
export function parseFormBody(body: string | Buffer): Record<string, unknown> {
  return querystring.parse(typeof body === "string" ? body : body.toString("utf8"));
}

export async function registerMessageRoutes(
  app: FastifyInstance,
  options: PageOptions & { deliver: DeliverMessage }
): Promise<void> {
  await app.register(async (scope) => {
    // Every body posted here is read as a form, whatever its Content-Type says
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser("*", { parseAs: "string" }, async (_request: FastifyRequest, body: string) =>
      parseFormBody(body)
    );

    scope.post("/message", async (request, reply) => {
      const message: Message = {
        username: formField(request.body, "username"),
        message: formField(request.body, "message"),
      };

      const missing = missingFields(message);
      if (missing.length > 0) {
        log.error(`Rejected submission, missing required field(s): ${missing.join(", ")}`);
        return sendErrorPage(reply, options);
      }

      try {
        await options.deliver(message);
      } catch (err) {
        // The browser is redirected either way
        log.error(`Failed to deliver message to socket listener: ${errorMessage(err)}`);
      }

      return reply.redirect("/");
    });
  });
}
