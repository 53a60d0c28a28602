import fs from 'fs';
import path from 'path';

export function JsonBigIntReplacer(key: string, value: unknown) {
  if (typeof value === 'bigint') {
    return value.toString() + 'n';
  }
  return value;
}

export function JsonBigIntReviver(key: string, value: unknown) {
  if (typeof value === 'string' && /^-?\d+n$/.test(value)) {
    return BigInt(value.slice(0, -1));
  }
  return value;
}

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function ReadJSON(filename: string): any {
  return JSON.parse(fs.readFileSync(filename, 'utf-8'), JsonBigIntReviver);
}

export function WriteJSON(filename: string, obj: unknown) {
  if (!fs.existsSync(path.dirname(filename))) {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }
  fs.writeFileSync(filename, JSON.stringify(obj, JsonBigIntReplacer, 2));
}

/**
 * Serialize a state object, bigints included. Two states are identical iff their serializations are.
 */
export function SerializeState(obj: unknown): string {
  return JSON.stringify(obj, JsonBigIntReplacer);
}

/**
 * Deep copy of a plain state object (records, arrays, bigints, numbers, strings, booleans)
 */
export function DeepCopy<T>(obj: T): T {
  return structuredClone(obj);
}
