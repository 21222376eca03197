import { defineConfig } from 'vite';

export default defineConfig({
  // index.html and main.ts live in app/
  root: 'app'
});
