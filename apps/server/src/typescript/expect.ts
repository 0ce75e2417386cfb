/**
 * Read a required string property, typically from `process.env`
 */
export function expectPropertyExists<K extends string>(obj: Partial<Record<K, string>>, key: K): string {
  const value = obj[key];
  if (value === undefined || value === '') {
    throw new Error(`Expected property "${key}" to be set`);
  }
  return value;
}

/**
 * Read an optional string property, falling back to `defaultValue` when unset or empty
 */
export function propertyOrDefault<K extends string>(obj: Partial<Record<K, string>>, key: K, defaultValue: string): string {
  const value = obj[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Split a comma separated list, dropping blanks
 */
export function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
