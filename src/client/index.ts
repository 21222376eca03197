/**
 * Client-side mounting.
 *
 * @packageDocumentation
 */

export { mount } from './mount.js';
export type { App, MountOptions, Program } from '../types.js';
