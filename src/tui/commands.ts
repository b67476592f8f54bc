// Input event -> table command mapping

import type { InputEvent } from '../types.js';

export type Command = 'quit' | 'next' | 'previous' | 'none';

export function commandFor(event: InputEvent): Command {
  if (event.type === 'mouse') {
    switch (event.action) {
      case 'scroll-down':
        return 'next';
      case 'scroll-up':
        return 'previous';
      default:
        return 'none';
    }
  }

  const { name, ctrl } = event.key;
  if (name === 'q' && !ctrl) return 'quit';
  // Raw mode swallows SIGINT
  if (name === 'c' && ctrl) return 'quit';
  if (name === 'down') return 'next';
  if (name === 'up') return 'previous';
  return 'none';
}
