/**
 * Access to state records keyed by account names. Account names are caller
 * supplied, so only own entries count and writes define a plain data
 * property even for keys such as `__proto__`.
 */

export type AccountRecord<T> = Record<string, T>;

export function entryOf<T>(record: AccountRecord<T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function setEntry<T>(record: AccountRecord<T>, key: string, value: NoInfer<T>): T {
  Object.defineProperty(record, key, { value, writable: true, enumerable: true, configurable: true });
  return value;
}

export function entryOrInit<T>(record: AccountRecord<T>, key: string, init: () => NoInfer<T>): T {
  return entryOf(record, key) ?? setEntry(record, key, init());
}

export function deleteEntry<T>(record: AccountRecord<T>, key: string): void {
  if (Object.hasOwn(record, key)) {
    delete record[key];
  }
}

export function recordFromEntries<T>(entries: Iterable<readonly [string, T]>): AccountRecord<T> {
  const record: AccountRecord<T> = {};
  for (const [key, value] of entries) {
    setEntry(record, key, value);
  }
  return record;
}
