/**
 * Object names: the structured identifier of a managed object.
 *
 * Grammar:
 *   <namespace>:<key>=<value>[,<key>=<value>]*
 *
 * Examples:
 *   org.example:type=Thing
 *   org.example:type=Cache,region=eu
 *
 * `toString()` keeps attribute insertion order; `canonicalName` sorts keys so that
 * two equal names always format to the same string.
 */

const SERVICE_NAME = "mbeankit:object-name";

// ── Validation regexes ───────────────────────────────────────────────

const NAMESPACE_ILLEGAL_RE = /[:\n]/;
const KEY_ILLEGAL_RE = /[:,=*?"\n]/;
const VALUE_ILLEGAL_RE = /[:,=*?"\n]/;

export type ObjectNameAttributes = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

export class ObjectName {
  readonly namespace: string;
  private readonly attributes: ReadonlyMap<string, string>;

  private constructor(namespace: string, attributes: Map<string, string>) {
    this.namespace = namespace;
    this.attributes = attributes;
  }

  /**
   * Build a name from a namespace and attributes.
   *
   * @throws ObjectNameError if the namespace, a key or a value cannot be formatted
   */
  static of(namespace: string, attributes: ObjectNameAttributes): ObjectName {
    const entries = isAttributeMap(attributes) ? [...attributes.entries()] : Object.entries(attributes);
    return ObjectName.build(namespace, entries, `${namespace}:<attributes>`);
  }

  /**
   * Parse the string form produced by `toString()` or `canonicalName`.
   *
   * @throws ObjectNameError on invalid format
   */
  static parse(input: string): ObjectName {
    const colonIdx = input.indexOf(":");
    if (colonIdx === -1) {
      throw new ObjectNameError(`${SERVICE_NAME}:parse - missing ":" after namespace in "${input}"`);
    }

    const namespace = input.slice(0, colonIdx);
    const list = input.slice(colonIdx + 1);
    if (!list) {
      throw new ObjectNameError(`${SERVICE_NAME}:parse - no attributes in "${input}"`);
    }

    const entries: Array<[string, string]> = [];
    for (const pair of list.split(",")) {
      const eqIdx = pair.indexOf("=");
      if (eqIdx === -1) {
        throw new ObjectNameError(`${SERVICE_NAME}:parse - attribute "${pair}" has no "=" in "${input}"`);
      }
      const key = pair.slice(0, eqIdx);
      if (entries.some(([k]) => k === key)) {
        throw new ObjectNameError(`${SERVICE_NAME}:parse - duplicate key "${key}" in "${input}"`);
      }
      entries.push([key, pair.slice(eqIdx + 1)]);
    }

    return ObjectName.build(namespace, entries, input);
  }

  private static build(namespace: string, entries: Array<[string, string]>, raw: string): ObjectName {
    if (NAMESPACE_ILLEGAL_RE.test(namespace)) {
      throw new ObjectNameError(`${SERVICE_NAME}:build - illegal character in namespace "${namespace}"`);
    }
    if (entries.length === 0) {
      throw new ObjectNameError(`${SERVICE_NAME}:build - at least one attribute is required for "${raw}"`);
    }

    const attributes = new Map<string, string>();
    for (const [key, value] of entries) {
      if (!key || KEY_ILLEGAL_RE.test(key)) {
        throw new ObjectNameError(`${SERVICE_NAME}:build - invalid key "${key}" in "${raw}"`);
      }
      if (!value || VALUE_ILLEGAL_RE.test(value)) {
        throw new ObjectNameError(`${SERVICE_NAME}:build - invalid value "${value}" for key "${key}" in "${raw}"`);
      }
      attributes.set(key, value);
    }

    return new ObjectName(namespace, attributes);
  }

  get(key: string): string | undefined {
    return this.attributes.get(key);
  }

  /** Attributes in insertion order. */
  entries(): Array<[string, string]> {
    return [...this.attributes.entries()];
  }

  /** Namespace and attributes with keys sorted; stable across insertion orders. */
  get canonicalName(): string {
    const sorted = this.entries().sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `${this.namespace}:${formatList(sorted)}`;
  }

  equals(other: ObjectName): boolean {
    if (this.namespace !== other.namespace) return false;
    if (this.attributes.size !== other.attributes.size) return false;
    for (const [key, value] of this.attributes) {
      if (other.attributes.get(key) !== value) return false;
    }
    return true;
  }

  toString(): string {
    return `${this.namespace}:${formatList(this.entries())}`;
  }

  toJSON(): string {
    return this.canonicalName;
  }
}

export function isAttributeMap(attributes: ObjectNameAttributes): attributes is ReadonlyMap<string, string> {
  return attributes instanceof Map;
}

function formatList(entries: Array<[string, string]>): string {
  return entries.map(([key, value]) => `${key}=${value}`).join(",");
}

// ── Error type ───────────────────────────────────────────────────────

export class ObjectNameError extends Error {
  readonly code = "MALFORMED_NAME";

  constructor(message: string) {
    super(message);
    this.name = "ObjectNameError";
  }
}
