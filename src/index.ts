/**
 * A small Model-View-Update runtime for the browser.
 *
 * @remarks
 * Programs are an `init`/`update`/`view` triple over an immutable model.
 * The runtime renders the view, turns DOM events into messages, and carries
 * out effect descriptions after each render.
 *
 * @packageDocumentation
 */

export type {
  App,
  Attribute,
  AttrNode,
  Decoder,
  Dispatch,
  EventNode,
  MountOptions,
  Program,
  PropNode,
  VElement,
  VNode,
  VText
} from './types.js';
export { Effect } from './effect.js';
export type { AfterRenderEffect, BatchEffect, FocusEffect, NoneEffect } from './effect.js';
export {
  h,
  keyed,
  text,
  attr,
  prop,
  className,
  classList,
  id,
  type,
  placeholder,
  href,
  name,
  htmlFor,
  autofocus,
  value,
  checked,
  disabled,
  hidden
} from './html.js';
export {
  on,
  onClick,
  onDoubleClick,
  onBlur,
  onInput,
  onCheck,
  onKeyDown,
  targetValue,
  targetChecked,
  eventKey
} from './events.js';
export { Renderer } from './patch.js';
export { focusElement, clearChildren } from './dom.js';
export { mount } from './client/index.js';
