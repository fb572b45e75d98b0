// ============================================
// EventQueue Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { EventQueue } from '../EventQueue';

describe('EventQueue', () => {
  it('drains events in arrival order and empties', () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(queue.length).toBe(2);
    expect(queue.drain()).toEqual([1, 2]);
    expect(queue.length).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  it('keeps events pushed after a drain for the next one', () => {
    const queue = new EventQueue<string>();
    queue.push('a');
    const first = queue.drain();
    queue.push('b');

    expect(first).toEqual(['a']);
    expect(queue.drain()).toEqual(['b']);
  });
});
