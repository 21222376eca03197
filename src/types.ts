/**
 * Core types for the runtime.
 *
 * @packageDocumentation
 */

import type { Effect } from './effect.js';

/**
 * Maps a DOM event to an application message.
 *
 * @typeParam Msg - The application's message type
 */
export type Decoder<Msg> = (event: Event) => Msg;

/**
 * A plain HTML attribute, written with `setAttribute`.
 */
export interface AttrNode {
  readonly kind: 'attr';
  readonly name: string;
  readonly value: string;
}

/**
 * A DOM property, assigned directly on the element.
 *
 * @remarks
 * Used for live form state (`value`, `checked`) where the attribute only
 * describes the initial value. The runtime compares against the element's
 * current property, not against the previous tree.
 */
export interface PropNode {
  readonly kind: 'prop';
  readonly name: string;
  readonly value: string | boolean;
}

/**
 * An event binding.
 *
 * @typeParam Msg - The message produced when the event fires
 */
export interface EventNode<Msg> {
  readonly kind: 'event';
  readonly name: string;
  readonly decode: Decoder<Msg>;
}

/**
 * Anything that can appear in an element's attribute list.
 */
export type Attribute<Msg> = AttrNode | PropNode | EventNode<Msg>;

/**
 * Virtual element.
 *
 * @remarks
 * When `keyed` is true every child carries a `key`, and children are matched
 * across renders by key instead of position.
 */
export interface VElement<Msg> {
  readonly kind: 'element';
  readonly tag: string;
  readonly key?: string;
  readonly attrs: readonly Attribute<Msg>[];
  readonly children: readonly VNode<Msg>[];
  readonly keyed: boolean;
}

/**
 * Virtual text node.
 */
export interface VText {
  readonly kind: 'text';
  readonly key?: string;
  readonly text: string;
}

/**
 * A node of the declarative view tree.
 */
export type VNode<Msg> = VElement<Msg> | VText;

/**
 * Sends a message into the run loop.
 */
export type Dispatch<Msg> = (msg: Msg) => void;

/**
 * A Model-View-Update program.
 *
 * @typeParam Model - Application state
 * @typeParam Msg - Messages accepted by `update`
 *
 * @example
 * ```ts
 * const counter: Program<number, 'inc'> = {
 *   init: () => [0, Effect.none],
 *   update: (n) => [n + 1, Effect.none],
 *   view: (n) => h('button', [onClick('inc')], [text(String(n))])
 * };
 * ```
 */
export interface Program<Model, Msg> {
  /** Initial state and the effect to run after the first render */
  init(): readonly [Model, Effect<Msg>];

  /** Pure state transition */
  update(model: Model, msg: Msg): readonly [Model, Effect<Msg>];

  /** Pure rendering of state to a view tree */
  view(model: Model): VNode<Msg>;
}

/**
 * Options for `mount`.
 */
export interface MountOptions {
  /**
   * Log every dispatched message with `console.debug`.
   *
   * @defaultValue false
   */
  trace?: boolean;
}

/**
 * Handle to a mounted program.
 */
export interface App<Model, Msg> {
  /** Queue a message for processing */
  dispatch: Dispatch<Msg>;

  /** Current state */
  getModel(): Model;

  /** Stop the run loop and clear the mount node */
  unmount(): void;
}
