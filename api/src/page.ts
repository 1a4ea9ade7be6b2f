import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { PageNotFoundError, PersistenceError } from "./errors.js";

export interface Page {
  title: string;
  body: Buffer;
}

export interface PageStore {
  save(page: Page): Promise<void>;
  load(title: string): Promise<Page>;
}

// owner read/write only
export const PAGE_FILE_MODE = 0o600;

export function pageFileName(title: string): string {
  return `${title}.txt`;
}

export function emptyPage(title: string): Page {
  return { title, body: Buffer.alloc(0) };
}

/**
 * One flat file per page, named after its title.
 *
 * Titles are used as file names as-is, so callers must only pass titles
 * that passed `extractTitle`. Nothing here serializes writers: two saves
 * of the same title race and the last one wins.
 */
export class FilePageStore implements PageStore {
  constructor(private readonly dir: string) {}

  filePath(title: string): string {
    return path.join(this.dir, pageFileName(title));
  }

  async save(page: Page): Promise<void> {
    try {
      await writeFile(this.filePath(page.title), page.body, { mode: PAGE_FILE_MODE });
    } catch (err) {
      throw new PersistenceError(page.title, err);
    }
  }

  async load(title: string): Promise<Page> {
    try {
      const body = await readFile(this.filePath(title));
      return { title, body };
    } catch (err) {
      throw new PageNotFoundError(title, err);
    }
  }
}
