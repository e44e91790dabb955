/** A key-value record as received from a caller. */
export interface RawRecord {
  readonly [key: string]: unknown;
}

/** Own value of `key`, or `undefined` when the record does not carry it. */
export function readField(record: RawRecord, key: string): unknown {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
