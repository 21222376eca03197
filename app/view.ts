/**
 * TodoMVC markup.
 */

import {
  h,
  keyed,
  text,
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
  hidden,
  onBlur,
  onCheck,
  onClick,
  onDoubleClick,
  onInput,
  onKeyDown
} from '../src/index.js';
import type { VNode } from '../src/index.js';
import { Filter } from './types.js';
import type { Model, Msg, Todo } from './types.js';
import { activeCount, allCompleted, hasTodos, itemsLeftLabel, visibleTodos } from './visibility.js';

const FILTER_LINKS: readonly (readonly [Filter, string])[] = [
  [Filter.All, '#/'],
  [Filter.Active, '#/active'],
  [Filter.Completed, '#/completed']
];

function viewHeader(model: Model): VNode<Msg> {
  return h('header', [className('header')], [
    h('h1', [], [text('todos')]),
    h('input', [
      className('new-todo'),
      placeholder('What needs to be done?'),
      autofocus(),
      name('newTodo'),
      value(model.newTodoInput),
      onInput((input): Msg => ({ type: 'UpdatedNewInput', text: input })),
      onKeyDown((key): Msg => (key === 'Enter' ? { type: 'AddTodo' } : { type: 'Noop' }))
    ])
  ]);
}

function viewTodo(model: Model, todo: Todo): VNode<Msg> {
  const children: VNode<Msg>[] = [
    h('div', [className('view')], [
      h('input', [
        className('toggle'),
        type('checkbox'),
        checked(todo.completed),
        onCheck((on): Msg => ({ type: 'ClickedToggle', id: todo.id, checked: on }))
      ]),
      h('label', [onDoubleClick<Msg>({ type: 'DoubleClickedTodo', id: todo.id, text: todo.description })], [
        text(todo.description)
      ]),
      h('button', [className('destroy'), onClick<Msg>({ type: 'DeletedTodo', id: todo.id })])
    ])
  ];

  if (todo.editing) {
    children.push(
      h('input', [
        className('edit'),
        id(`todo-edit-${todo.id}`),
        name('title'),
        value(model.existingTodoInput),
        onInput((input): Msg => ({ type: 'UpdatedExistingInput', text: input })),
        onBlur<Msg>({ type: 'BlurredExistingTodo', id: todo.id }),
        onKeyDown((key): Msg => (key === 'Enter' ? { type: 'EditedTodo', id: todo.id } : { type: 'Noop' }))
      ])
    );
  }

  return h('li', [classList([['completed', todo.completed], ['editing', todo.editing]])], children);
}

function viewMain(model: Model): VNode<Msg> {
  const empty = !hasTodos(model);

  return h('section', [className('main')], [
    h('input', [
      className('toggle-all'),
      id('toggle-all'),
      type('checkbox'),
      hidden(empty),
      checked(allCompleted(model)),
      onCheck((on): Msg => ({ type: 'ClickedToggleAll', checked: on }))
    ]),
    h('label', [htmlFor('toggle-all'), hidden(empty)], [text('Mark all as complete')]),
    keyed(
      'ul',
      [className('todo-list')],
      visibleTodos(model).map((todo) => [String(todo.id), viewTodo(model, todo)] as const)
    )
  ]);
}

function viewFilter(current: Filter, filter: Filter, url: string): VNode<Msg> {
  return h('li', [], [
    h('a', [href(url), classList([['selected', current === filter]]), onClick<Msg>({ type: 'ClickedFilter', filter })], [
      text(filter)
    ])
  ]);
}

function viewFooter(model: Model): VNode<Msg> {
  return h('footer', [className('footer')], [
    h('span', [className('todo-count')], [text(itemsLeftLabel(activeCount(model)))]),
    h('ul', [className('filters')], FILTER_LINKS.map(([filter, url]) => viewFilter(model.filter, filter, url))),
    // Disabled on an empty list, not on "no completed todos"
    h('button', [className('clear-completed'), disabled(!hasTodos(model)), onClick<Msg>({ type: 'ClickedClearCompleted' })], [
      text('Clear completed')
    ])
  ]);
}

export function view(model: Model): VNode<Msg> {
  return h('div', [className('todomvc-wrapper')], [
    h('section', [className('todoapp')], [viewHeader(model), viewMain(model), viewFooter(model)]),
    h('footer', [className('info')], [h('p', [], [text('Double-click to edit a todo')])])
  ]);
}
