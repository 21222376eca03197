/**
 * Client-side run loop.
 *
 * @packageDocumentation
 */

import type { App, MountOptions, Program } from '../types.js';
import type { Effect } from '../effect.js';
import { Renderer } from '../patch.js';
import { clearChildren, focusElement } from '../dom.js';

/** Elements currently hosting a program */
const mounted = new WeakSet<Element>();

/**
 * Mount a program on an element and start its run loop.
 *
 * @remarks
 * Any existing content of `node` (for example server-rendered markup) is
 * replaced by the program's first render. Each message is run through
 * `update`, the view is re-rendered and patched into the DOM, and only then
 * is the returned effect carried out.
 *
 * Messages dispatched while another is being processed, including events the
 * DOM fires during a patch, are queued and handled in order.
 *
 * @param program - The init/update/view triple
 * @param node - The element to render into
 * @param options - Run loop options
 * @returns A handle for dispatching messages and inspecting state
 *
 * @example
 * ```ts
 * const app = mount(todoProgram, document.querySelector('#app')!);
 * app.dispatch({ type: 'ClickedFilter', filter: Filter.Active });
 * ```
 */
export function mount<Model, Msg>(
  program: Program<Model, Msg>,
  node: Element,
  options: MountOptions = {}
): App<Model, Msg> {
  if (mounted.has(node)) {
    throw new Error('[mvu] Element already hosts a mounted program');
  }

  const { trace = false } = options;
  const [initialModel, initialEffect] = program.init();
  let model = initialModel;
  const queue: Msg[] = [];
  let processing = false;
  let active = true;

  const dispatch = (msg: Msg): void => {
    if (!active) {
      console.warn('[mvu] Message dispatched after unmount was ignored:', msg);
      return;
    }
    queue.push(msg);
    if (!processing) {
      drain();
    }
  };

  const renderer = new Renderer<Msg>(node, dispatch);

  const runEffect = (effect: Effect<Msg>): void => {
    switch (effect.kind) {
      case 'none':
        return;
      case 'batch':
        for (const inner of effect.effects) {
          runEffect(inner);
        }
        return;
      case 'focus':
        if (!focusElement(node, effect.selector)) {
          console.warn(`[mvu] No focusable element matches "${effect.selector}"`);
        }
        return;
      case 'after-render':
        try {
          effect.run(dispatch);
        } catch (err) {
          console.error('[mvu] Error in after-render effect:', err);
        }
        return;
    }
  };

  const step = (msg: Msg): void => {
    if (trace) {
      console.debug('[mvu] dispatch', msg);
    }
    const [next, effect] = program.update(model, msg);
    model = next;
    renderer.render(program.view(model));
    runEffect(effect);
  };

  const drain = (): void => {
    processing = true;
    try {
      // Length is re-read each pass: steps may enqueue further messages
      for (let i = 0; i < queue.length && active; i++) {
        step(queue[i]);
      }
    } finally {
      queue.length = 0;
      processing = false;
    }
  };

  processing = true;
  try {
    clearChildren(node);
    renderer.render(program.view(model));
    runEffect(initialEffect);
  } finally {
    processing = false;
  }
  mounted.add(node);
  if (queue.length > 0) {
    drain();
  }

  return {
    dispatch,
    getModel: () => model,
    unmount: () => {
      if (!active) {
        return;
      }
      active = false;
      queue.length = 0;
      clearChildren(node);
      mounted.delete(node);
    }
  };
}
