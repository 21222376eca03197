/**
 * Server-side rendering of view trees.
 *
 * @packageDocumentation
 */

import { Window } from 'happy-dom';
import type { Document, Node } from 'happy-dom';
import type { VNode } from '../types.js';

const windowSettings = {
  disableJavaScriptEvaluation: true,
  disableJavaScriptFileLoading: true,
  disableCSSFileLoading: true
};

let scratch: Window | undefined;

/**
 * Build the happy-dom nodes for a view tree.
 *
 * Event bindings are skipped. Boolean properties become empty attributes
 * when true; string properties become attributes.
 */
function build<Msg>(document: Document, vnode: VNode<Msg>): Node {
  if (vnode.kind === 'text') {
    return document.createTextNode(vnode.text);
  }

  const el = document.createElement(vnode.tag);

  for (const a of vnode.attrs) {
    switch (a.kind) {
      case 'attr':
        el.setAttribute(a.name, a.value);
        break;
      case 'prop':
        if (typeof a.value === 'string') {
          el.setAttribute(a.name, a.value);
        } else if (a.value) {
          el.setAttribute(a.name, '');
        }
        break;
      case 'event':
        break;
    }
  }

  for (const child of vnode.children) {
    el.appendChild(build(document, child));
  }

  return el;
}

/**
 * Serialize a view tree to HTML.
 *
 * @remarks
 * The tree is built in a fresh happy-dom document and serialized by it.
 * Event bindings have no HTML form and are dropped; the client replaces the
 * markup with a live tree when it mounts.
 *
 * @example
 * ```ts
 * renderToString(h('input', [className('toggle'), checked(true)]));
 * // => '<input class="toggle" checked="">'
 * ```
 */
export function renderToString<Msg>(vnode: VNode<Msg>): string {
  scratch ??= new Window({ settings: windowSettings });
  const document = new scratch.DOMParser().parseFromString('', 'text/html');
  const wrapper = document.createElement('div');
  wrapper.appendChild(build(document, vnode));
  return wrapper.innerHTML;
}

/**
 * Render a view tree into an HTML page.
 *
 * @remarks
 * The page shell is parsed with happy-dom; the content of the first element
 * matching `selector` is replaced with the rendered tree and the whole
 * document is serialized back, doctype included. Scripts in the shell are
 * neither loaded nor run.
 *
 * @param template - Full HTML page
 * @param selector - CSS selector of the mount element
 * @param vnode - The tree to render
 * @returns The page HTML
 * @throws Error if no element matches `selector`
 */
export async function renderDocument<Msg>(template: string, selector: string, vnode: VNode<Msg>): Promise<string> {
  const window = new Window({ settings: windowSettings });

  try {
    const document = new window.DOMParser().parseFromString(template, 'text/html');
    const target = document.querySelector(selector);
    if (!target) {
      throw new Error(`[mvu] No element matches "${selector}" in page template`);
    }

    target.innerHTML = '';
    target.appendChild(build(document, vnode));

    const doctype = document.doctype ? `<!DOCTYPE ${document.doctype.name}>` : '';
    return doctype + document.documentElement.outerHTML;
  } finally {
    await window.happyDOM.close();
  }
}
