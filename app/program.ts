/**
 * The todo app as a runnable program.
 */

import type { Program } from '../src/index.js';
import type { TodoCollection } from './store.js';
import type { Model, Msg } from './types.js';
import { init, update } from './update.js';
import { view } from './view.js';

/**
 * @param todos - Backing collection for the initial state
 */
export function createTodoProgram(todos?: TodoCollection): Program<Model, Msg> {
  return {
    init: () => init(todos),
    update,
    view
  };
}
