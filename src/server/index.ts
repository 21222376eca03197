/**
 * Server-side rendering utilities.
 *
 * @packageDocumentation
 */

export { renderToString, renderDocument } from './render.js';
