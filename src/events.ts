/**
 * Event bindings that turn DOM events into application messages.
 *
 * @packageDocumentation
 */

import type { Decoder, EventNode } from './types.js';

/**
 * Bind an arbitrary event to a decoder.
 *
 * @example
 * ```ts
 * on('submit', (event) => {
 *   event.preventDefault();
 *   return { type: 'Saved' };
 * });
 * ```
 */
export function on<Msg>(name: string, decode: Decoder<Msg>): EventNode<Msg> {
  return { kind: 'event', name, decode };
}

/**
 * Read `event.target.value`, or an empty string when the target has none.
 */
export function targetValue(event: Event): string {
  const target = event.target;
  if (target && 'value' in target && typeof target.value === 'string') {
    return target.value;
  }
  return '';
}

/**
 * Read `event.target.checked`, or false when the target is not a checkbox.
 */
export function targetChecked(event: Event): boolean {
  const target = event.target;
  if (target && 'checked' in target && typeof target.checked === 'boolean') {
    return target.checked;
  }
  return false;
}

/**
 * Read `event.key`, or an empty string for non-keyboard events.
 */
export function eventKey(event: Event): string {
  if ('key' in event && typeof event.key === 'string') {
    return event.key;
  }
  return '';
}

export function onClick<Msg>(msg: Msg): EventNode<Msg> {
  return on('click', () => msg);
}

export function onDoubleClick<Msg>(msg: Msg): EventNode<Msg> {
  return on('dblclick', () => msg);
}

export function onBlur<Msg>(msg: Msg): EventNode<Msg> {
  return on('blur', () => msg);
}

/**
 * Fires on every keystroke in a text field with the field's current value.
 */
export function onInput<Msg>(tagger: (value: string) => Msg): EventNode<Msg> {
  return on('input', (event) => tagger(targetValue(event)));
}

/**
 * Fires when a checkbox changes with its new `checked` state.
 */
export function onCheck<Msg>(tagger: (checked: boolean) => Msg): EventNode<Msg> {
  return on('change', (event) => tagger(targetChecked(event)));
}

/**
 * Fires on keydown with the pressed key's name (`Enter`, `Escape`, `a`, ...).
 */
export function onKeyDown<Msg>(tagger: (key: string) => Msg): EventNode<Msg> {
  return on('keydown', (event) => tagger(eventKey(event)));
}
