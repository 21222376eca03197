/**
 * TodoMVC types.
 */

import type { TodoCollection } from './store.js';

export interface Todo {
  readonly id: number;
  readonly description: string;
  readonly completed: boolean;
  readonly editing: boolean;
}

/**
 * Which todos the list shows.
 */
export enum Filter {
  All = 'All',
  Active = 'Active',
  Completed = 'Completed'
}

export interface Model {
  readonly todos: TodoCollection;
  readonly filter: Filter;
  /** Highest id handed out so far; never decreases */
  readonly lastId: number;
  /** Text of the "What needs to be done?" field */
  readonly newTodoInput: string;
  /** Text of the edit field of the todo being edited */
  readonly existingTodoInput: string;
}

export type Msg =
  | { readonly type: 'AddTodo' }
  | { readonly type: 'UpdatedNewInput'; readonly text: string }
  | { readonly type: 'UpdatedExistingInput'; readonly text: string }
  | { readonly type: 'DoubleClickedTodo'; readonly id: number; readonly text: string }
  | { readonly type: 'BlurredExistingTodo'; readonly id: number }
  | { readonly type: 'EditedTodo'; readonly id: number }
  | { readonly type: 'ClickedToggle'; readonly id: number; readonly checked: boolean }
  | { readonly type: 'ClickedToggleAll'; readonly checked: boolean }
  | { readonly type: 'DeletedTodo'; readonly id: number }
  | { readonly type: 'ClickedClearCompleted' }
  | { readonly type: 'ClickedFilter'; readonly filter: Filter }
  | { readonly type: 'Noop' };
