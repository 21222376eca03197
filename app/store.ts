/**
 * Immutable todo collections.
 *
 * @remarks
 * Two interchangeable backings: an array kept in id order, and a map keyed
 * by id. Every operation returns a new collection, or the same instance when
 * nothing changed, so callers can detect no-ops by identity.
 */

import type { Todo } from './types.js';

export interface TodoCollection {
  readonly size: number;
  get(id: number): Todo | undefined;
  has(id: number): boolean;
  /** Add a todo, replacing any todo with the same id */
  insert(todo: Todo): TodoCollection;
  /** Replace the todo with `id`; a miss returns this collection */
  update(id: number, fn: (todo: Todo) => Todo): TodoCollection;
  /** Remove the todo with `id`; a miss returns this collection */
  remove(id: number): TodoCollection;
  map(fn: (todo: Todo) => Todo): TodoCollection;
  filter(predicate: (todo: Todo) => boolean): TodoCollection;
  /** Todos in ascending id order */
  toArray(): readonly Todo[];
}

/**
 * Array-backed collection. Items are kept sorted by id.
 */
export class TodoList implements TodoCollection {
  private constructor(private readonly items: readonly Todo[]) {}

  static empty(): TodoList {
    return new TodoList([]);
  }

  static of(todos: readonly Todo[]): TodoList {
    return new TodoList([...todos].sort((a, b) => a.id - b.id));
  }

  get size(): number {
    return this.items.length;
  }

  get(id: number): Todo | undefined {
    return this.items.find((todo) => todo.id === id);
  }

  has(id: number): boolean {
    return this.items.some((todo) => todo.id === id);
  }

  insert(todo: Todo): TodoList {
    const rest = this.items.filter((t) => t.id !== todo.id);
    const at = rest.findIndex((t) => t.id > todo.id);
    if (at === -1) {
      return new TodoList([...rest, todo]);
    }
    return new TodoList([...rest.slice(0, at), todo, ...rest.slice(at)]);
  }

  update(id: number, fn: (todo: Todo) => Todo): TodoList {
    const at = this.items.findIndex((todo) => todo.id === id);
    if (at === -1) {
      return this;
    }
    const items = [...this.items];
    items[at] = fn(this.items[at]);
    return new TodoList(items);
  }

  remove(id: number): TodoList {
    if (!this.has(id)) {
      return this;
    }
    return new TodoList(this.items.filter((todo) => todo.id !== id));
  }

  map(fn: (todo: Todo) => Todo): TodoList {
    return new TodoList(this.items.map(fn));
  }

  filter(predicate: (todo: Todo) => boolean): TodoList {
    const items = this.items.filter(predicate);
    return items.length === this.items.length ? this : new TodoList(items);
  }

  toArray(): readonly Todo[] {
    return this.items;
  }
}

/**
 * Map-backed collection keyed by id.
 *
 * @remarks
 * Map iteration order is never used for display; `toArray` sorts.
 */
export class TodoMap implements TodoCollection {
  private constructor(private readonly items: ReadonlyMap<number, Todo>) {}

  static empty(): TodoMap {
    return new TodoMap(new Map());
  }

  static of(todos: readonly Todo[]): TodoMap {
    return new TodoMap(new Map(todos.map((todo) => [todo.id, todo])));
  }

  get size(): number {
    return this.items.size;
  }

  get(id: number): Todo | undefined {
    return this.items.get(id);
  }

  has(id: number): boolean {
    return this.items.has(id);
  }

  insert(todo: Todo): TodoMap {
    const items = new Map(this.items);
    items.set(todo.id, todo);
    return new TodoMap(items);
  }

  update(id: number, fn: (todo: Todo) => Todo): TodoMap {
    const todo = this.items.get(id);
    if (!todo) {
      return this;
    }
    const items = new Map(this.items);
    items.set(id, fn(todo));
    return new TodoMap(items);
  }

  remove(id: number): TodoMap {
    if (!this.items.has(id)) {
      return this;
    }
    const items = new Map(this.items);
    items.delete(id);
    return new TodoMap(items);
  }

  map(fn: (todo: Todo) => Todo): TodoMap {
    const items = new Map<number, Todo>();
    for (const [id, todo] of this.items) {
      items.set(id, fn(todo));
    }
    return new TodoMap(items);
  }

  filter(predicate: (todo: Todo) => boolean): TodoMap {
    const items = new Map<number, Todo>();
    for (const [id, todo] of this.items) {
      if (predicate(todo)) {
        items.set(id, todo);
      }
    }
    return items.size === this.items.size ? this : new TodoMap(items);
  }

  toArray(): readonly Todo[] {
    return Array.from(this.items.values()).sort((a, b) => a.id - b.id);
  }
}
