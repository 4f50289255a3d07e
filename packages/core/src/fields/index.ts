/**
 * Value accepted by a field set. Numbers are stringified; blank values are dropped.
 */
export type FieldValue = string | number | boolean | null | undefined;

/**
 * Checks whether a value would be transmitted as an empty field.
 *
 * @param value - The candidate field value
 * @returns True for undefined, null and empty or whitespace-only strings
 */
export function isBlank(value: FieldValue): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  return typeof value === "string" && value.trim() === "";
}

/**
 * Ordered mapping from field name to string value, as posted to a gateway.
 *
 * Insertion order is kept because some signature algorithms depend on it.
 * Blank values are never stored, so a field set always equals what goes on
 * the wire.
 */
export class FieldSet {
  private readonly fields: Map<string, string>;

  constructor(entries?: Iterable<readonly [string, string]>) {
    this.fields = new Map();
    if (entries) {
      for (const [name, value] of entries) {
        this.set(name, value);
      }
    }
  }

  /**
   * Writes a field, replacing any previous value. Blank values are ignored and
   * leave an existing value untouched.
   *
   * @param name - Field name as expected by the gateway
   * @param value - Value to write
   * @returns The field set for chaining
   */
  set(name: string, value: FieldValue): FieldSet {
    if (!isBlank(value)) {
      this.fields.set(name, String(value));
    }
    return this;
  }

  /**
   * Writes a field only when it is not already present (first writer wins).
   *
   * @param name - Field name as expected by the gateway
   * @param value - Value to write
   * @returns The field set for chaining
   */
  setIfAbsent(name: string, value: FieldValue): FieldSet {
    if (!this.fields.has(name)) {
      this.set(name, value);
    }
    return this;
  }

  /**
   * Copies allow-listed entries of a structured input into the field set.
   * Keys outside the allow-list are never forwarded.
   *
   * @param source - Structured input, e.g. 3-D Secure options
   * @param allowList - Pairs of source key and gateway field name, in write order
   * @returns The field set for chaining
   */
  merge<T extends object>(
    source: T | undefined,
    allowList: ReadonlyArray<readonly [keyof T, string]>,
  ): FieldSet {
    if (!source) {
      return this;
    }
    for (const [key, name] of allowList) {
      const value: unknown = source[key];
      if (isFieldValue(value)) {
        this.set(name, value);
      }
    }
    return this;
  }

  /**
   * Like {@link FieldSet.merge}, but never overwrites a field that is already set.
   *
   * @param source - Structured input, e.g. a postal address
   * @param allowList - Pairs of source key and gateway field name, in write order
   * @returns The field set for chaining
   */
  fill<T extends object>(
    source: T | undefined,
    allowList: ReadonlyArray<readonly [keyof T, string]>,
  ): FieldSet {
    if (!source) {
      return this;
    }
    for (const [key, name] of allowList) {
      const value: unknown = source[key];
      if (isFieldValue(value)) {
        this.setIfAbsent(name, value);
      }
    }
    return this;
  }

  get(name: string): string | undefined {
    return this.fields.get(name);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  delete(name: string): boolean {
    return this.fields.delete(name);
  }

  get size(): number {
    return this.fields.size;
  }

  keys(): string[] {
    return Array.from(this.fields.keys());
  }

  entries(): Array<[string, string]> {
    return Array.from(this.fields.entries());
  }

  clone(): FieldSet {
    return new FieldSet(this.fields.entries());
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.fields);
  }

  /**
   * Encodes the field set as an `application/x-www-form-urlencoded` body.
   *
   * @returns The encoded body, fields in insertion order
   */
  toFormBody(): string {
    return new URLSearchParams(this.entries()).toString();
  }
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === undefined ||
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}
