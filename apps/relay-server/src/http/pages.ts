import type { FastifyInstance, FastifyReply } from "fastify";
import fs from "node:fs/promises";
import path from "node:path";
import { lookup } from "mime-types";

const HTML = "text/html; charset=utf-8";
const FALLBACK_TYPE = "application/octet-stream";

export interface PageOptions {
  pagesDir: string;
  staticDir: string;
}

/** Resolve a request path under `root`, or null if it escapes it */
export function resolveStaticPath(root: string, requested: string): string | null {
  const base = path.resolve(root);
  const target = path.resolve(base, requested);
  return target.startsWith(base + path.sep) ? target : null;
}

export function contentTypeFor(filePath: string): string {
  return lookup(filePath) || FALLBACK_TYPE;
}

async function readOrNull(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch {
    // Any read failure is served as not found
    return null;
  }
}

export async function sendErrorPage(
  reply: FastifyReply,
  options: PageOptions,
  status = 404
): Promise<FastifyReply> {
  const body = await readOrNull(path.join(options.pagesDir, "error.html"));
  if (!body) {
    return reply.code(status).type("text/plain; charset=utf-8").send("Not Found");
  }
  return reply.code(status).type(HTML).send(body);
}

export async function sendPage(
  reply: FastifyReply,
  options: PageOptions,
  filename: string
): Promise<FastifyReply> {
  const body = await readOrNull(path.join(options.pagesDir, filename));
  if (!body) return sendErrorPage(reply, options);
  return reply.code(200).type(HTML).send(body);
}

export function registerPageRoutes(app: FastifyInstance, options: PageOptions): void {
  app.get("/", (_request, reply) => sendPage(reply, options, "index.html"));
  app.get("/index.html", (_request, reply) => sendPage(reply, options, "index.html"));
  app.get("/message.html", (_request, reply) => sendPage(reply, options, "message.html"));
  app.get("/error.html", (_request, reply) => sendPage(reply, options, "error.html"));

  app.get<{ Params: { "*": string } }>("/static/*", async (request, reply) => {
    const filePath = resolveStaticPath(options.staticDir, request.params["*"]);
    const body = filePath ? await readOrNull(filePath) : null;
    if (!filePath || !body) return sendErrorPage(reply, options);

    return reply.code(200).type(contentTypeFor(filePath)).send(body);
  });

  app.setNotFoundHandler((_request, reply) => sendErrorPage(reply, options));
}
