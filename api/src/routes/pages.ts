import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { describeError, TemplateError } from '../errors.js';
import { emptyPage, type Page, type PageStore } from '../page.js';
import type { TemplateName, TemplateSet } from '../templates.js';
import { extractTitle, requestPath } from '../title.js';

export interface PageRouteDeps {
  store: PageStore;
  templates: TemplateSet;
}

export type PageHandler = (
  req: FastifyRequest,
  reply: FastifyReply,
  deps: PageRouteDeps
) => Promise<FastifyReply>;

export interface PageRoute {
  method: 'GET' | 'POST';
  prefix: string;
  handler: PageHandler;
}

const TEXT = 'text/plain; charset=utf-8';

// A field sent twice arrives as an array; the first value wins.
const FormFields = z.object({
  body: z.union([z.string(), z.array(z.string())]).optional(),
});

function formField(raw: unknown): string | undefined {
  const parsed = FormFields.safeParse(raw ?? {});
  if (!parsed.success) return undefined;
  const { body } = parsed.data;
  return Array.isArray(body) ? body[0] : body;
}

// Posted form values take precedence over the query string.
function readBodyField(req: FastifyRequest): string {
  return formField(req.body) ?? formField(req.query) ?? '';
}

/**
 * Validates the title in the request path. On failure the 404 has
 * already been sent when this returns undefined.
 */
function getTitle(req: FastifyRequest, reply: FastifyReply): string | undefined {
  const result = extractTitle(requestPath(req.url));
  if (!result.ok) {
    req.log.warn({ err: result.error }, 'rejected page path');
    reply.code(404).type(TEXT).send('404 page not found');
    return undefined;
  }
  req.log.debug({ title: result.title }, 'page path matched');
  return result.title;
}

export function renderTemplate(
  reply: FastifyReply,
  templates: TemplateSet,
  name: TemplateName,
  page: Page
): FastifyReply {
  let html: string;
  try {
    html = templates.render(name, page);
  } catch (err) {
    if (!(err instanceof TemplateError)) throw err;
    reply.log.error({ err, template: name }, 'template render failed');
    return reply.code(500).type(TEXT).send(err.message);
  }
  return reply.type('text/html; charset=utf-8').send(html);
}

export async function viewHandler(req: FastifyRequest, reply: FastifyReply, { store, templates }: PageRouteDeps) {
  const title = getTitle(req, reply);
  if (title === undefined) return reply;

  let page: Page;
  try {
    page = await store.load(title);
  } catch (err) {
    req.log.info({ err, title }, 'page not found');
    return reply.code(404).type(TEXT).send('could not find page.');
  }
  return renderTemplate(reply, templates, 'view', page);
}

export async function editHandler(req: FastifyRequest, reply: FastifyReply, { store, templates }: PageRouteDeps) {
  const title = getTitle(req, reply);
  if (title === undefined) return reply;

  let page: Page;
  try {
    page = await store.load(title);
  } catch {
    // nothing saved yet: start a new page
    page = emptyPage(title);
  }
  return renderTemplate(reply, templates, 'edit', page);
}

export async function saveHandler(req: FastifyRequest, reply: FastifyReply, { store }: PageRouteDeps) {
  const title = getTitle(req, reply);
  if (title === undefined) return reply;

  const page: Page = { title, body: Buffer.from(readBodyField(req), 'utf8') };
  try {
    await store.save(page);
  } catch (err) {
    req.log.error({ err, title }, 'page save failed');
    return reply.code(500).type(TEXT).send(describeError(err));
  }
  return reply.redirect(`/view/${title}`);
}

export const pageRoutes: readonly PageRoute[] = [
  { method: 'GET', prefix: '/view/', handler: viewHandler },
  { method: 'GET', prefix: '/edit/', handler: editHandler },
  { method: 'POST', prefix: '/save/', handler: saveHandler },
];

export function registerPageRoutes(
  app: FastifyInstance,
  deps: PageRouteDeps,
  routes: readonly PageRoute[] = pageRoutes
) {
  for (const route of routes) {
    app.route({
      method: route.method,
      url: `${route.prefix}*`,
      handler: (req, reply) => route.handler(req, reply, deps),
    });
  }
}
