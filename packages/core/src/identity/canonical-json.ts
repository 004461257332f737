import { IdentityError } from '../exceptions.js';
import { sha256Hex } from '../hash.js';

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function encode(value: unknown, path: string): string | undefined {
  if (value === undefined) return undefined;
  if (value === null) return 'null';

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return JSON.stringify(value);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new IdentityError(`Non-finite number at ${path}`);
      }
      return JSON.stringify(value);
    case 'object':
      break;
    default:
      throw new IdentityError(`Unsupported ${typeof value} at ${path}`);
  }

  if (Array.isArray(value)) {
    const items = value.map((item, i) => encode(item, `${path}[${i}]`) ?? 'null');
    return `[${items.join(',')}]`;
  }

  if (!isPlainObject(value)) {
    throw new IdentityError(`Unsupported object at ${path}`);
  }

  const members: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const encoded = encode(Reflect.get(value, key), `${path}.${key}`);
    if (encoded !== undefined) {
      members.push(`${JSON.stringify(key)}:${encoded}`);
    }
  }
  return `{${members.join(',')}}`;
}

/**
 * JSON with object keys sorted at every depth and `undefined` members dropped,
 * so that two structurally equal values always encode to the same string.
 */
export function canonicalJson(value: unknown): string {
  const encoded = encode(value, '$');
  if (encoded === undefined) {
    throw new IdentityError('Cannot encode undefined');
  }
  return encoded;
}

export function fingerprint(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}
