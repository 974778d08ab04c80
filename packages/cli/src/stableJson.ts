// plain objects only; arrays keep their order
function sortKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/** Pretty JSON with object keys in code-unit order at every depth. */
export function stableJsonStringify(input: unknown): string {
  return JSON.stringify(input, sortKeys, 2);
}
