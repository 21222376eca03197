/**
 * @vitest-environment jsdom
 */

import { describe, it, expect } from 'vitest';
import {
  eventKey,
  on,
  onBlur,
  onCheck,
  onClick,
  onDoubleClick,
  onInput,
  onKeyDown,
  targetChecked,
  targetValue
} from '../src/events.js';

function inputEvent(value: string): Event {
  const input = document.createElement('input');
  input.value = value;
  const event = new Event('input');
  input.dispatchEvent(event);
  return event;
}

describe('event readers', () => {
  it('should read the target value', () => {
    expect(targetValue(inputEvent('Buy milk'))).toBe('Buy milk');
  });

  it('should read an empty value when there is no target', () => {
    expect(targetValue(new Event('input'))).toBe('');
  });

  it('should read the checked state of a checkbox', () => {
    const box = document.createElement('input');
    box.type = 'checkbox';
    box.checked = true;
    const event = new Event('change');
    box.dispatchEvent(event);

    expect(targetChecked(event)).toBe(true);
    expect(targetChecked(new Event('change'))).toBe(false);
  });

  it('should read the key of a keyboard event', () => {
    expect(eventKey(new KeyboardEvent('keydown', { key: 'Enter' }))).toBe('Enter');
    expect(eventKey(new Event('keydown'))).toBe('');
  });
});

describe('bindings', () => {
  it('should name the DOM event each binding listens to', () => {
    expect(onClick('a').name).toBe('click');
    expect(onDoubleClick('a').name).toBe('dblclick');
    expect(onBlur('a').name).toBe('blur');
    expect(onInput((v) => v).name).toBe('input');
    expect(onCheck((c) => c).name).toBe('change');
    expect(onKeyDown((k) => k).name).toBe('keydown');
    expect(on('submit', () => 'saved').name).toBe('submit');
  });

  it('should decode through the tagger', () => {
    expect(onInput((v) => `typed ${v}`).decode(inputEvent('x'))).toBe('typed x');
    expect(onKeyDown((k) => k === 'Enter').decode(new KeyboardEvent('keydown', { key: 'Enter' }))).toBe(true);
    expect(onClick(7).decode(new MouseEvent('click'))).toBe(7);
  });
});
