/**
 * Pick the comma-separated fields from each item and print them as JSON.
 * Used by commands that take `--json <fields>`.
 */
export function printJsonFields(items: object[], fieldSpec: string): void {
  console.log(JSON.stringify(pickJsonFields(items, fieldSpec), null, 2));
}

export function pickJsonFields(items: object[], fieldSpec: string): Record<string, unknown>[] {
  const fields = fieldSpec.split(",").map((f) => f.trim()).filter(Boolean);
  return items.map((item) => {
    const entries = new Map(Object.entries(item));
    const obj: Record<string, unknown> = {};
    for (const f of fields) {
      if (entries.has(f)) obj[f] = entries.get(f);
    }
    return obj;
  });
}
