/**
 * Response headers by lower-cased name, every value kept in arrival order
 */
export type HeaderMap = Record<string, string[]>;

export function toHeaderMap(headers: Record<string, string | string[] | undefined>): HeaderMap {
  const map: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    const values = Array.isArray(value) ? value : [value];
    map[key] = [...(map[key] ?? []), ...values];
  }
  return map;
}

/**
 * Flatten a header map into name/value pairs, one per value
 */
export function headerEntries(map: HeaderMap): Array<[string, string]> {
  return Object.entries(map).flatMap(([name, values]) =>
    values.map((value): [string, string] => [name, value])
  );
}
