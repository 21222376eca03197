/**
 * DOM utilities used by the run loop.
 *
 * @packageDocumentation
 */

/**
 * Focus the first element under `root` matching a selector.
 *
 * @remarks
 * The root itself is checked before its descendants. Elements without a
 * `focus` method (SVG in some environments) count as a miss.
 *
 * @returns true when an element was focused
 *
 * @example
 * ```ts
 * focusElement(container, '#todo-edit-3');
 * ```
 */
export function focusElement(root: Element, selector: string): boolean {
  const target = root.matches(selector) ? root : root.querySelector(selector);
  if (!target || !('focus' in target) || typeof target.focus !== 'function') {
    return false;
  }
  target.focus();
  return true;
}

/**
 * Remove every child node of an element.
 */
export function clearChildren(el: Element): void {
  while (el.firstChild) {
    el.removeChild(el.firstChild);
  }
}
