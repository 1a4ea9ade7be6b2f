import Fastify, { type FastifyInstance } from "fastify";
import formbody from "@fastify/formbody";
import multipart from "@fastify/multipart";
import type { LogLevel } from "./config.js";
import type { PageStore } from "./page.js";
import { registerPageRoutes } from "./routes/pages.js";
import type { TemplateSet } from "./templates.js";

export interface AppOptions {
  store: PageStore;
  templates: TemplateSet;
  frontPage?: string;
  // logging is off when unset
  logLevel?: LogLevel;
}

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: opts.logLevel ? { level: opts.logLevel } : false });

  await app.register(formbody);
  // multipart text fields land on req.body as plain values
  await app.register(multipart, { attachFieldsToBody: "keyValues" });

  app.get("/health", async () => ({ ok: true }));

  const frontPage = opts.frontPage ?? "FrontPage";
  app.get("/", async (_req, reply) => reply.redirect(`/view/${frontPage}`));

  registerPageRoutes(app, { store: opts.store, templates: opts.templates });

  return app;
}
