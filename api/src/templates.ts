import { readFile } from "node:fs/promises";
import path from "node:path";
import { TemplateError } from "./errors.js";
import type { Page } from "./page.js";

export type TemplateName = "view" | "edit";
export const TEMPLATE_NAMES: readonly TemplateName[] = ["view", "edit"];

type PageField = "Title" | "Body";

type Segment =
  | { kind: "text"; text: string }
  | { kind: "field"; field: PageField };

export interface CompiledTemplate {
  name: string;
  segments: readonly Segment[];
}

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&#34;",
  "'": "&#39;",
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (c) => ESCAPES[c] ?? c);
}

function toField(action: string): PageField | undefined {
  // {{.Title}} and {{Title}} are the same action
  switch (action.replace(/^\./, "")) {
    case "Title":
      return "Title";
    case "Body":
      return "Body";
    default:
      return undefined;
  }
}

/**
 * Parses template source made of literal text and `{{Title}}` / `{{Body}}`
 * actions. Throws TemplateError on an unclosed action or an unknown field.
 */
export function compileTemplate(name: string, source: string): CompiledTemplate {
  const segments: Segment[] = [];
  let cursor = 0;
  while (cursor < source.length) {
    const open = source.indexOf("{{", cursor);
    if (open === -1) {
      segments.push({ kind: "text", text: source.slice(cursor) });
      break;
    }
    if (open > cursor) segments.push({ kind: "text", text: source.slice(cursor, open) });

    const close = source.indexOf("}}", open + 2);
    if (close === -1) {
      throw new TemplateError(`template "${name}": unclosed action at offset ${open}`);
    }
    const action = source.slice(open + 2, close).trim();
    const field = toField(action);
    if (!field) {
      throw new TemplateError(`template "${name}": unknown field "${action}"`);
    }
    segments.push({ kind: "field", field });
    cursor = close + 2;
  }
  return { name, segments };
}

function fieldValue(page: Page, field: PageField): string {
  return field === "Title" ? page.title : page.body.toString("utf8");
}

/** Compiled templates, fixed once built and shared by every request. */
export class TemplateSet {
  private readonly templates: ReadonlyMap<string, CompiledTemplate>;

  constructor(templates: Iterable<CompiledTemplate>) {
    this.templates = new Map(Array.from(templates, (t) => [t.name, t] as const));
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  render(name: string, page: Page): string {
    const tmpl = this.templates.get(name);
    if (!tmpl) throw new TemplateError(`template "${name}" is not defined`);
    return tmpl.segments
      .map((s) => (s.kind === "text" ? s.text : escapeHtml(fieldValue(page, s.field))))
      .join("");
  }
}

export async function loadTemplates(dir: string): Promise<TemplateSet> {
  const compiled: CompiledTemplate[] = [];
  for (const name of TEMPLATE_NAMES) {
    const file = path.join(dir, `${name}.html`);
    let source: string;
    try {
      source = await readFile(file, "utf8");
    } catch (err) {
      throw new TemplateError(`could not read template "${name}" from ${file}`, err);
    }
    compiled.push(compileTemplate(name, source));
  }
  return new TemplateSet(compiled);
}
