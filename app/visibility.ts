/**
 * Derived views of the model used by the footer and the list.
 */

import { Filter } from './types.js';
import type { Model, Todo } from './types.js';

export function matchesFilter(filter: Filter, todo: Todo): boolean {
  switch (filter) {
    case Filter.All:
      return true;
    case Filter.Active:
      return !todo.completed;
    case Filter.Completed:
      return todo.completed;
  }
}

/**
 * Todos passing the current filter, in ascending id order.
 */
export function visibleTodos(model: Model): readonly Todo[] {
  return model.todos
    .toArray()
    .filter((todo) => matchesFilter(model.filter, todo))
    .sort((a, b) => a.id - b.id);
}

export function activeCount(model: Model): number {
  return model.todos.toArray().filter((todo) => !todo.completed).length;
}

export function hasTodos(model: Model): boolean {
  return model.todos.size > 0;
}

/**
 * Whether there is at least one todo and every todo is completed.
 */
export function allCompleted(model: Model): boolean {
  return hasTodos(model) && activeCount(model) === 0;
}

/**
 * Footer label, e.g. "1 item left" or "3 items left".
 */
export function itemsLeftLabel(count: number): string {
  return `${count} ${count === 1 ? 'item' : 'items'} left`;
}
