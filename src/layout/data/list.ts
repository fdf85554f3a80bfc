/**
 * Doubly linked queue. Entries carry their own cell so they can be moved
 * between lists in O(1); `dequeue` returns the oldest entry.
 */

export class ListCell<T> {
  prev: ListCell<T> = this;
  next: ListCell<T> = this;

  constructor(readonly value?: T) {}
}

export interface Listed<T> {
  cell?: ListCell<T>;
}

export class List<T extends Listed<T>> {
  private readonly sentinel = new ListCell<T>();

  dequeue(): T | undefined {
    const cell = this.sentinel.prev;
    if (cell === this.sentinel) return undefined;
    unlink(cell);
    return cell.value;
  }

  enqueue(entry: T): void {
    let cell = entry.cell;
    if (cell) {
      unlink(cell);
    } else {
      cell = new ListCell(entry);
      entry.cell = cell;
    }
    cell.next = this.sentinel.next;
    this.sentinel.next.prev = cell;
    this.sentinel.next = cell;
    cell.prev = this.sentinel;
  }

  isEmpty(): boolean {
    return this.sentinel.next === this.sentinel;
  }

  toString(): string {
    const strs: string[] = [];
    let curr = this.sentinel.prev;
    while (curr !== this.sentinel) {
      strs.push(JSON.stringify(curr.value, (k: string, v: unknown) => (k === 'cell' ? undefined : v)));
      curr = curr.prev;
    }
    return '[' + strs.join(', ') + ']';
  }
}

function unlink<T>(cell: ListCell<T>): void {
  cell.prev.next = cell.next;
  cell.next.prev = cell.prev;
  cell.next = cell;
  cell.prev = cell;
}
