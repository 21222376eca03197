/// <reference types="vite/client" />
/**
 * Todo app entry point.
 */

import { mount } from '../src/index.js';
import { createTodoProgram } from './program.js';

function start() {
  const root = document.getElementById('app');
  if (!root) {
    throw new Error('Todo app mount element #app not found');
  }
  mount(createTodoProgram(), root, { trace: import.meta.env.DEV });
}

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', start);
} else {
  start();
}
