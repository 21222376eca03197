/**
 * SSR server for the todo app.
 */

import { createServer } from 'http';
import { renderPage } from './ssr.js';

const server = createServer(async (req, res) => {
  const page = await renderPage(req.url || '/');
  res.statusCode = page.status;
  res.setHeader('Content-Type', page.contentType);
  res.end(page.body);
});

const port = process.env.PORT ? parseInt(process.env.PORT) : 3000;
server.listen(port, () => {
  console.log(`SSR server running at http://localhost:${port}`);
});
