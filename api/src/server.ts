import type { FastifyInstance } from "fastify";
import { buildApp } from "./app.js";
import type { WikiConfig } from "./config.js";
import { StartupError } from "./errors.js";
import { FilePageStore } from "./page.js";
import { loadTemplates, type TemplateSet } from "./templates.js";

export type StartupResult =
  | { ok: true; app: FastifyInstance; address: string }
  | { ok: false; error: StartupError };

/**
 * Loads templates, builds the app and binds the listener. Either every
 * step succeeds and the server is serving, or nothing is left running.
 */
export async function startServer(config: WikiConfig): Promise<StartupResult> {
  let templates: TemplateSet;
  try {
    templates = await loadTemplates(config.templatesDir);
  } catch (err) {
    return { ok: false, error: new StartupError("could not load templates", err) };
  }

  const app = await buildApp({
    store: new FilePageStore(config.pagesDir),
    templates,
    frontPage: config.frontPage,
    logLevel: config.logLevel,
  });

  try {
    const address = await app.listen({ host: config.host, port: config.port });
    return { ok: true, app, address };
  } catch (err) {
    await app.close();
    return { ok: false, error: new StartupError(`could not listen on ${config.host}:${config.port}`, err) };
  }
}
