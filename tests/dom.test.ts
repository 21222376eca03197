/**
 * Tests for DOM utilities.
 *
 * @vitest-environment jsdom
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { clearChildren, focusElement } from '../src/dom.js';

describe('focusElement', () => {
  let root: HTMLElement;

  beforeEach(() => {
    root = document.createElement('div');
    root.innerHTML = '<ul><li><input id="todo-edit-1" class="edit"></li></ul><input class="other">';
    document.body.appendChild(root);
  });

  afterEach(() => {
    document.body.innerHTML = '';
  });

  it('should focus the first matching descendant', () => {
    expect(focusElement(root, '.edit')).toBe(true);
    expect(document.activeElement?.id).toBe('todo-edit-1');
  });

  it('should match the root itself', () => {
    root.tabIndex = 0;

    expect(focusElement(root, 'div')).toBe(true);
    expect(document.activeElement).toBe(root);
  });

  it('should report a miss', () => {
    expect(focusElement(root, '#todo-edit-2')).toBe(false);
    expect(root.contains(document.activeElement)).toBe(false);
  });
});

describe('clearChildren', () => {
  it('should remove every child node', () => {
    const el = document.createElement('section');
    el.innerHTML = 'text<p>a</p><!-- note --><p>b</p>';

    clearChildren(el);

    expect(el.childNodes.length).toBe(0);
  });
});
