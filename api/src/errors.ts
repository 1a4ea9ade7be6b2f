export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class InvalidPathError extends Error {
  constructor(readonly path: string) {
    super(`invalid page title in path ${JSON.stringify(path)}`);
    this.name = "InvalidPathError";
  }
}

export class PageNotFoundError extends Error {
  constructor(readonly title: string, cause?: unknown) {
    super(`could not find page "${title}"`, { cause });
    this.name = "PageNotFoundError";
  }
}

export class PersistenceError extends Error {
  constructor(readonly title: string, cause: unknown) {
    super(`could not save page "${title}": ${describeError(cause)}`, { cause });
    this.name = "PersistenceError";
  }
}

export class TemplateError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TemplateError";
  }
}

// Raised before the server accepts connections; never a per-request error.
export class StartupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
    this.name = "StartupError";
  }
}
