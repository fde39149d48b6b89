/**
 * Deterministic JSON stringify:
 * - Keys named in `keyOrder` come first, in that order
 * - Remaining keys are sorted
 * - Array order is preserved (hierarchy children keep discovery order)
 *
 * This guarantees stable output for tests and for diffing artifacts between iterations.
 */
export function stableStringify(value: unknown, space: number = 2, keyOrder: readonly string[] = []): string {
  const rank = new Map<string, number>();
  keyOrder.forEach((k, i) => rank.set(k, i));
  return JSON.stringify(orderKeysDeep(value, rank), null, space) + '\n';
}

function orderKeysDeep(v: unknown, rank: Map<string, number>): unknown {
  if (v === null || v === undefined) return v;
  if (Array.isArray(v)) return v.map((x) => orderKeysDeep(x, rank));
  if (typeof v !== 'object') return v;

  const keys = Object.keys(v).sort((a, b) => {
    const ra = rank.get(a);
    const rb = rank.get(b);
    if (ra !== undefined && rb !== undefined) return ra - rb;
    if (ra !== undefined) return -1;
    if (rb !== undefined) return 1;
    return a.localeCompare(b);
  });
  const out: Record<string, unknown> = {};
  for (const k of keys) {
    out[k] = orderKeysDeep(Reflect.get(v, k), rank);
  }
  return out;
}
