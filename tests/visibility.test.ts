import { describe, it, expect } from 'vitest';
import { TodoMap, TodoList } from '../app/store.js';
import { Filter } from '../app/types.js';
import type { Model, Todo } from '../app/types.js';
import {
  activeCount,
  allCompleted,
  hasTodos,
  itemsLeftLabel,
  matchesFilter,
  visibleTodos
} from '../app/visibility.js';

function todo(id: number, completed: boolean): Todo {
  return { id, description: `todo ${id}`, completed, editing: false };
}

function model(todos: Todo[], filter = Filter.All): Model {
  return { todos: TodoMap.of(todos), filter, lastId: 10, newTodoInput: '', existingTodoInput: '' };
}

describe('matchesFilter', () => {
  it('should match by completion state', () => {
    expect(matchesFilter(Filter.All, todo(1, true))).toBe(true);
    expect(matchesFilter(Filter.All, todo(1, false))).toBe(true);
    expect(matchesFilter(Filter.Active, todo(1, false))).toBe(true);
    expect(matchesFilter(Filter.Active, todo(1, true))).toBe(false);
    expect(matchesFilter(Filter.Completed, todo(1, true))).toBe(true);
    expect(matchesFilter(Filter.Completed, todo(1, false))).toBe(false);
  });
});

describe('visibleTodos', () => {
  const todos = [todo(7, false), todo(2, true), todo(5, false), todo(1, true)];

  it('should sort every filter by ascending id', () => {
    expect(visibleTodos(model(todos)).map((t) => t.id)).toEqual([1, 2, 5, 7]);
    expect(visibleTodos(model(todos, Filter.Active)).map((t) => t.id)).toEqual([5, 7]);
    expect(visibleTodos(model(todos, Filter.Completed)).map((t) => t.id)).toEqual([1, 2]);
  });

  it('should give the same order for both collection backings', () => {
    const fromList = visibleTodos({ ...model([]), todos: TodoList.of(todos) });

    expect(fromList).toEqual(visibleTodos(model(todos)));
  });

  it('should be empty when nothing matches', () => {
    expect(visibleTodos(model([todo(1, false)], Filter.Completed))).toEqual([]);
  });
});

describe('counts', () => {
  it('should count active todos', () => {
    expect(activeCount(model([todo(1, false), todo(2, true), todo(3, false)]))).toBe(2);
    expect(activeCount(model([]))).toBe(0);
  });

  it('should report whether there are todos', () => {
    expect(hasTodos(model([]))).toBe(false);
    expect(hasTodos(model([todo(1, true)]))).toBe(true);
  });

  it('should report all completed only for a non-empty list', () => {
    expect(allCompleted(model([]))).toBe(false);
    expect(allCompleted(model([todo(1, true), todo(2, true)]))).toBe(true);
    expect(allCompleted(model([todo(1, true), todo(2, false)]))).toBe(false);
  });
});

describe('itemsLeftLabel', () => {
  it('should pluralize on every count except one', () => {
    expect(itemsLeftLabel(0)).toBe('0 items left');
    expect(itemsLeftLabel(1)).toBe('1 item left');
    expect(itemsLeftLabel(2)).toBe('2 items left');
  });
});
