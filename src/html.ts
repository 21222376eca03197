/**
 * Declarative element, attribute and text-node construction.
 *
 * @packageDocumentation
 */

import type { Attribute, AttrNode, PropNode, VElement, VNode, VText } from './types.js';

/**
 * Create a virtual element.
 *
 * @typeParam Msg - Inferred from the event bindings inside; a subtree with
 * none is `never` and fits into a tree of any message type
 *
 * @example
 * ```ts
 * h('label', [onDoubleClick(msg)], [text(todo.description)]);
 * ```
 */
export function h<Msg = never>(
  tag: string,
  attrs: readonly Attribute<Msg>[] = [],
  children: readonly VNode<Msg>[] = []
): VElement<Msg> {
  return { kind: 'element', tag, attrs, children, keyed: false };
}

/**
 * Create a virtual element whose children are matched by key across renders.
 *
 * @remarks
 * Keys must be unique among siblings. Reordering, inserting or removing a
 * keyed child moves the existing DOM node instead of rewriting its neighbours.
 *
 * @example
 * ```ts
 * keyed('ul', [className('todo-list')], todos.map((t) => [String(t.id), viewTodo(t)]));
 * ```
 */
export function keyed<Msg = never>(
  tag: string,
  attrs: readonly Attribute<Msg>[],
  children: readonly (readonly [string, VNode<Msg>])[]
): VElement<Msg> {
  return {
    kind: 'element',
    tag,
    attrs,
    children: children.map(([key, node]) => ({ ...node, key })),
    keyed: true
  };
}

export function text(value: string): VText {
  return { kind: 'text', text: value };
}

export function attr(name: string, value: string): AttrNode {
  return { kind: 'attr', name, value };
}

export function prop(name: string, value: string | boolean): PropNode {
  return { kind: 'prop', name, value };
}

export function className(value: string): AttrNode {
  return attr('class', value);
}

/**
 * Build a `class` attribute from `[name, enabled]` pairs.
 *
 * @example
 * ```ts
 * classList([['completed', todo.completed], ['editing', todo.editing]]);
 * ```
 */
export function classList(entries: readonly (readonly [string, boolean])[]): AttrNode {
  return className(entries.filter(([, on]) => on).map(([name]) => name).join(' '));
}

export function id(value: string): AttrNode {
  return attr('id', value);
}

export function type(value: string): AttrNode {
  return attr('type', value);
}

export function placeholder(value: string): AttrNode {
  return attr('placeholder', value);
}

export function href(value: string): AttrNode {
  return attr('href', value);
}

export function name(value: string): AttrNode {
  return attr('name', value);
}

export function htmlFor(value: string): AttrNode {
  return attr('for', value);
}

export function autofocus(): AttrNode {
  return attr('autofocus', '');
}

export function value(current: string): PropNode {
  return prop('value', current);
}

export function checked(on: boolean): PropNode {
  return prop('checked', on);
}

export function disabled(on: boolean): PropNode {
  return prop('disabled', on);
}

export function hidden(on: boolean): PropNode {
  return prop('hidden', on);
}
