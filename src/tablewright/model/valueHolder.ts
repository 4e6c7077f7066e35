// model/valueHolder.ts

/** Single-slot cell for a value bound after the holder is handed out */
export class ValueHolder<T> {
  constructor(public value: T) {}

  get(): T {
    return this.value;
  }
}
