/**
 * Arbitrary-precision number as held by the store.
 *
 * Stores keep numeric attributes as decimal strings; converting them to a
 * JavaScript number loses precision, so that step happens once, in the
 * result formatter.
 */
export class StoreDecimal {
  constructor(readonly value: string) {}

  toNumber(): number {
    return Number(this.value);
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

export function isStoreDecimal(value: unknown): value is StoreDecimal {
  return value instanceof StoreDecimal;
}
