export class AttributeUsageError extends Error {
  override readonly name = 'AttributeUsageError';

  constructor(
    readonly attribute: string,
    message?: string,
  ) {
    super(message ?? `Attribute "${attribute}" cannot be used in the filter/where/order clause of a query`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryUsageError extends Error {
  override readonly name = 'QueryUsageError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryCompileError extends Error {
  override readonly name = 'QueryCompileError';

  constructor(
    readonly value: unknown,
    readonly actualType: string,
    readonly expectedTypes: readonly string[],
    message?: string,
  ) {
    super(
      message ??
        `Unexpected value ${describeValue(value)} of type '${actualType}', expected one of: ${expectedTypes.join(', ')}`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    message: string,
    readonly issues: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Runtime type name used in error messages: class name for objects, typeof otherwise. */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || proto === Object.prototype) return 'object';
    return value.constructor.name;
  }
  return typeof value;
}

/** Short rendering of a value for error messages; never throws. */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return describeType(value);
  }
}
