export function isString(text: unknown): text is string {
  return typeof text === 'string';
}

export function toNumber(value: string): number | undefined {
  const number = Number.parseInt(value, 10);
  if (!Number.isNaN(number)) {
    return number;
  }
  return undefined;
}

export function stringifySafe(obj: unknown, indent?: number): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    obj,
    (_key, value: unknown) => {
      if (value instanceof Set) {
        return Array.from(value);
      }
      if (value instanceof Error) {
        return { name: value.name, message: value.message };
      }
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) {
          return '[Circular]';
        }
        seen.add(value);
      }
      return value;
    },
    indent
  );
}

export function errorToString(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
