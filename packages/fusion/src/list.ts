/**
 * Persistent singly linked list. Consing shares the tail, so appending to a
 * concatenation can prepend to the existing list without copying it.
 */

export interface ConsCell<T> {
  readonly head: T;
  readonly tail: ConsList<T>;
}

export class ConsList<T> implements Iterable<T> {
  private static readonly EMPTY = new ConsList<never>(undefined);

  private constructor(readonly cell: ConsCell<T> | undefined) {}

  static empty<T>(): ConsList<T> {
    return ConsList.EMPTY;
  }

  static of<T>(...items: T[]): ConsList<T> {
    return ConsList.fromArray(items);
  }

  static fromArray<T>(items: readonly T[]): ConsList<T> {
    let list = ConsList.empty<T>();
    for (let i = items.length - 1; i >= 0; i--) {
      list = list.cons(items[i]);
    }
    return list;
  }

  get isEmpty(): boolean {
    return this.cell === undefined;
  }

  get length(): number {
    let n = 0;
    for (let cell = this.cell; cell; cell = cell.tail.cell) n++;
    return n;
  }

  cons(head: T): ConsList<T> {
    return new ConsList({ head, tail: this });
  }

  reverse(): ConsList<T> {
    let result = ConsList.empty<T>();
    for (let cell = this.cell; cell; cell = cell.tail.cell) {
      result = result.cons(cell.head);
    }
    return result;
  }

  toArray(): T[] {
    const result: T[] = [];
    for (let cell = this.cell; cell; cell = cell.tail.cell) {
      result.push(cell.head);
    }
    return result;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let cell = this.cell; cell; cell = cell.tail.cell) {
      yield cell.head;
    }
  }
}
