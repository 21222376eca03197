/**
 * Server-side rendering of the initial todo page.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import { renderDocument } from '../src/server/index.js';
import { createTodoProgram } from './program.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Where the client mounts; the server fills the same element */
export const MOUNT_SELECTOR = '#app';

export interface PageResponse {
  status: number;
  contentType: string;
  body: string;
}

/**
 * Render the page for a request path.
 *
 * @remarks
 * Only `/` exists. The page carries the view of the initial state; the
 * client bundle replaces it with a live tree on load.
 *
 * @param url - Request path
 * @param templatePath - Page shell to render into
 */
export async function renderPage(
  url: string,
  templatePath: string = resolve(__dirname, 'index.html')
): Promise<PageResponse> {
  if (url !== '/') {
    return { status: 404, contentType: 'text/plain', body: 'Not found' };
  }

  try {
    const template = await readFile(templatePath, 'utf-8');
    const program = createTodoProgram();
    const [model] = program.init();
    const body = await renderDocument(template, MOUNT_SELECTOR, program.view(model));
    return { status: 200, contentType: 'text/html', body };
  } catch (e) {
    console.error(e);
    const message = e instanceof Error ? e.stack ?? e.message : String(e);
    return { status: 500, contentType: 'text/plain', body: message };
  }
}
