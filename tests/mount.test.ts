/**
 * Run loop tests.
 *
 * @vitest-environment jsdom
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mount } from '../src/client/mount.js';
import { Effect } from '../src/effect.js';
import { h, text, className, id } from '../src/html.js';
import { onClick } from '../src/events.js';
import type { Program } from '../src/types.js';

type Msg =
  | { type: 'inc' }
  | { type: 'focus' }
  | { type: 'focusMissing' }
  | { type: 'boom' }
  | { type: 'twice' };

const counter: Program<number, Msg> = {
  init: () => [0, Effect.none],
  update: (n, msg) => {
    switch (msg.type) {
      case 'inc':
        return [n + 1, Effect.none];
      case 'focus':
        return [n, Effect.focus('#field')];
      case 'focusMissing':
        return [n, Effect.focus('#nowhere')];
      case 'boom':
        return [n, Effect.afterRender<Msg>(() => {
          throw new Error('boom');
        })];
      case 'twice':
        return [n, Effect.afterRender<Msg>((dispatch) => {
          dispatch({ type: 'inc' });
          dispatch({ type: 'inc' });
        })];
    }
  },
  view: (n) =>
    h('div', [], [
      h('span', [className('count')], [text(String(n))]),
      h('input', [id('field')]),
      h('button', [onClick<Msg>({ type: 'inc' })], [text('+')])
    ])
};

describe('mount', () => {
  let node: HTMLElement;

  beforeEach(() => {
    node = document.createElement('div');
    document.body.appendChild(node);
  });

  afterEach(() => {
    document.body.innerHTML = '';
    vi.restoreAllMocks();
  });

  it('should replace existing content with the first render', () => {
    node.innerHTML = '<p>server markup</p>';

    mount(counter, node);

    expect(node.innerHTML).toBe('<div><span class="count">0</span><input id="field"><button>+</button></div>');
  });

  it('should re-render after each message', () => {
    const app = mount(counter, node);

    app.dispatch({ type: 'inc' });
    node.querySelector('button')?.click();

    expect(app.getModel()).toBe(2);
    expect(node.querySelector('.count')?.textContent).toBe('2');
  });

  it('should refuse to mount twice on one element', () => {
    mount(counter, node);

    expect(() => mount(counter, node)).toThrow('[mvu] Element already hosts a mounted program');
  });

  it('should run the init effect after the first render', () => {
    let seen: string | null | undefined;
    const program: Program<number, Msg> = {
      ...counter,
      init: () => [5, Effect.afterRender<Msg>(() => {
        seen = node.querySelector('.count')?.textContent;
      })]
    };

    mount(program, node);

    expect(seen).toBe('5');
  });

  it('should focus after the view is committed', () => {
    const app = mount(counter, node);

    app.dispatch({ type: 'focus' });

    expect(document.activeElement).toBe(node.querySelector('#field'));
  });

  it('should warn when nothing matches the focus selector', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const app = mount(counter, node);

    app.dispatch({ type: 'focusMissing' });

    expect(warn).toHaveBeenCalledWith('[mvu] No focusable element matches "#nowhere"');
  });

  it('should log a failing after-render effect and keep running', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const app = mount(counter, node);

    app.dispatch({ type: 'boom' });
    app.dispatch({ type: 'inc' });

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toBe('[mvu] Error in after-render effect:');
    expect(app.getModel()).toBe(1);
  });

  it('should queue messages dispatched by an effect', () => {
    const app = mount(counter, node);

    app.dispatch({ type: 'twice' });

    expect(app.getModel()).toBe(2);
    expect(node.querySelector('.count')?.textContent).toBe('2');
  });

  it('should trace messages when asked', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const app = mount(counter, node, { trace: true });

    app.dispatch({ type: 'inc' });

    expect(debug).toHaveBeenCalledWith('[mvu] dispatch', { type: 'inc' });
  });

  it('should not trace by default', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const app = mount(counter, node);

    app.dispatch({ type: 'inc' });

    expect(debug).not.toHaveBeenCalled();
  });

  describe('unmount', () => {
    it('should clear the node and ignore later messages', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const app = mount(counter, node);

      app.unmount();
      app.dispatch({ type: 'inc' });

      expect(node.childNodes.length).toBe(0);
      expect(app.getModel()).toBe(0);
      expect(warn).toHaveBeenCalledWith('[mvu] Message dispatched after unmount was ignored:', { type: 'inc' });
    });

    it('should allow mounting again', () => {
      mount(counter, node).unmount();

      const app = mount(counter, node);

      expect(app.getModel()).toBe(0);
      expect(node.querySelector('.count')?.textContent).toBe('0');
    });
  });
});
