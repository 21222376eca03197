/**
 * Effect descriptions returned alongside state.
 *
 * @remarks
 * `update` stays pure: instead of touching the DOM it returns a description
 * of what should happen, and the run loop carries it out after the view has
 * been committed.
 *
 * @packageDocumentation
 */

import type { Dispatch } from './types.js';

/** No side effect */
export interface NoneEffect {
  readonly kind: 'none';
}

/** Several effects, run in order */
export interface BatchEffect<Msg> {
  readonly kind: 'batch';
  readonly effects: readonly Effect<Msg>[];
}

/** Arbitrary callback run once the next render is committed */
export interface AfterRenderEffect<Msg> {
  readonly kind: 'after-render';
  readonly run: (dispatch: Dispatch<Msg>) => void;
}

/** Focus the first element under the mount node matching a selector */
export interface FocusEffect {
  readonly kind: 'focus';
  readonly selector: string;
}

export type Effect<Msg> = NoneEffect | BatchEffect<Msg> | AfterRenderEffect<Msg> | FocusEffect;

const none: NoneEffect = { kind: 'none' };

/**
 * Effect constructors.
 *
 * @example
 * ```ts
 * return [{ ...model, editing: id }, Effect.focus(`#todo-edit-${id}`)];
 * ```
 */
export const Effect = {
  none,

  batch<Msg>(effects: readonly Effect<Msg>[]): Effect<Msg> {
    const live = effects.filter((e) => e.kind !== 'none');
    if (live.length === 0) {
      return none;
    }
    if (live.length === 1) {
      return live[0];
    }
    return { kind: 'batch', effects: live };
  },

  afterRender<Msg>(run: (dispatch: Dispatch<Msg>) => void): Effect<Msg> {
    return { kind: 'after-render', run };
  },

  focus(selector: string): FocusEffect {
    return { kind: 'focus', selector };
  }
} as const;
