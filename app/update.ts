/**
 * State transitions for the todo app.
 */

import { Effect } from '../src/index.js';
import { TodoMap } from './store.js';
import type { TodoCollection } from './store.js';
import { Filter } from './types.js';
import type { Model, Msg, Todo } from './types.js';

type Step = readonly [Model, Effect<Msg>];

/**
 * Selector of the edit field rendered for a todo in edit mode.
 */
export function editFieldSelector(id: number): string {
  return `#todo-edit-${id}`;
}

/**
 * Initial state: no todos, every todo shown, empty inputs.
 *
 * @param todos - Backing collection; a map keyed by id unless given
 */
export function init(todos: TodoCollection = TodoMap.empty()): Step {
  return [
    {
      todos,
      filter: Filter.All,
      lastId: 0,
      newTodoInput: '',
      existingTodoInput: ''
    },
    Effect.none
  ];
}

function unchanged(model: Model): Step {
  return [model, Effect.none];
}

function withTodos(model: Model, todos: TodoCollection): Step {
  return todos === model.todos ? unchanged(model) : [{ ...model, todos }, Effect.none];
}

export function update(model: Model, msg: Msg): Step {
  switch (msg.type) {
    case 'AddTodo': {
      const id = model.lastId + 1;
      const todo: Todo = { id, description: model.newTodoInput, completed: false, editing: false };
      return [
        { ...model, todos: model.todos.insert(todo), lastId: id, newTodoInput: '' },
        Effect.none
      ];
    }

    case 'UpdatedNewInput':
      return [{ ...model, newTodoInput: msg.text }, Effect.none];

    case 'UpdatedExistingInput':
      return [{ ...model, existingTodoInput: msg.text }, Effect.none];

    case 'DoubleClickedTodo': {
      if (!model.todos.has(msg.id)) {
        return unchanged(model);
      }
      // Only one todo is edited at a time
      const todos = model.todos.map((todo) => {
        const editing = todo.id === msg.id;
        return todo.editing === editing ? todo : { ...todo, editing };
      });
      return [
        { ...model, todos, existingTodoInput: msg.text },
        Effect.focus(editFieldSelector(msg.id))
      ];
    }

    case 'BlurredExistingTodo': {
      if (!model.todos.has(msg.id)) {
        return unchanged(model);
      }
      const todos = model.todos.update(msg.id, (todo) => ({ ...todo, editing: false }));
      return [{ ...model, todos, existingTodoInput: '' }, Effect.none];
    }

    case 'EditedTodo': {
      if (model.existingTodoInput === '') {
        return update(model, { type: 'DeletedTodo', id: msg.id });
      }
      const description = model.existingTodoInput;
      return withTodos(model, model.todos.update(msg.id, (todo) => ({ ...todo, description, editing: false })));
    }

    case 'ClickedToggle':
      return withTodos(model, model.todos.update(msg.id, (todo) => ({ ...todo, completed: msg.checked })));

    case 'ClickedToggleAll':
      return withTodos(model, model.todos.map((todo) => ({ ...todo, completed: msg.checked })));

    case 'DeletedTodo':
      return withTodos(model, model.todos.remove(msg.id));

    case 'ClickedClearCompleted':
      return withTodos(model, model.todos.filter((todo) => !todo.completed));

    case 'ClickedFilter':
      return [{ ...model, filter: msg.filter }, Effect.none];

    case 'Noop':
      return unchanged(model);
  }
}
