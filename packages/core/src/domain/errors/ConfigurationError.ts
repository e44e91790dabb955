/** Thrown when a model, descriptor or registry is given something that is not a usable field type. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

/** Human-readable type of an arbitrary value, used in configuration messages. */
export function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object' && typeof value !== 'function') return typeof value;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'object';
}
