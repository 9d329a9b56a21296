import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { registerPageRoutes, sendErrorPage, type PageOptions } from "./pages.js";
import { registerMessageRoutes, type DeliverMessage } from "./messages.js";
import { createLogger } from "../log.js";

const log = createLogger("http");

export interface HttpFrontOptions extends PageOptions {
  deliver: DeliverMessage;
}

export async function buildHttpFront(options: HttpFrontOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  // Framework errors (bad Content-Length, oversized bodies) get the error page too
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const status =
      error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 600
        ? error.statusCode
        : 500;
    log.error(`${request.method} ${request.url} failed with ${status}: ${error.message}`);
    return sendErrorPage(reply, options, status);
  });

  registerPageRoutes(app, options);
  await registerMessageRoutes(app, options);

  return app;
}
