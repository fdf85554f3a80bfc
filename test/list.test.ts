import { describe, expect, test } from 'vitest';
import { List, type ListCell } from '../src/layout/data/list.js';

interface Entry {
  v: string;
  cell?: ListCell<Entry>;
}

describe('List', () => {
  test('dequeue on an empty list returns undefined', () => {
    const list = new List<Entry>();
    expect(list.isEmpty()).toBe(true);
    expect(list.dequeue()).toBeUndefined();
  });

  test('dequeues in insertion order', () => {
    const list = new List<Entry>();
    const a: Entry = { v: 'a' };
    const b: Entry = { v: 'b' };
    list.enqueue(a);
    list.enqueue(b);
    expect(list.isEmpty()).toBe(false);
    expect(list.dequeue()).toBe(a);
    expect(list.dequeue()).toBe(b);
    expect(list.isEmpty()).toBe(true);
  });

  test('re-enqueueing an entry moves it to the back', () => {
    const list = new List<Entry>();
    const a: Entry = { v: 'a' };
    const b: Entry = { v: 'b' };
    list.enqueue(a);
    list.enqueue(b);
    list.enqueue(a);
    expect(list.dequeue()).toBe(b);
    expect(list.dequeue()).toBe(a);
  });

  test('moves an entry between lists', () => {
    const first = new List<Entry>();
    const second = new List<Entry>();
    const a: Entry = { v: 'a' };
    first.enqueue(a);
    second.enqueue(a);
    expect(first.isEmpty()).toBe(true);
    expect(second.dequeue()).toBe(a);
  });

  test('toString lists entries oldest first without cells', () => {
    const list = new List<Entry>();
    list.enqueue({ v: 'a' });
    list.enqueue({ v: 'b' });
    expect(list.toString()).toBe('[{"v":"a"}, {"v":"b"}]');
  });
});
