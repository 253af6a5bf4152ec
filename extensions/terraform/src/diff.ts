/**
 * Attribute-level diffing shared by the planner and the state manager.
 */

export type AttributeChange = { path: string; before: unknown; after: unknown };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON with object keys sorted, so key order never counts as a change. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (isPlainObject(value)) {
    const keys = Object.keys(value).filter((k) => value[k] !== undefined).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * Diff two attribute objects and return changed fields. Nested objects are
 * walked; arrays and scalars compare by value.
 */
export function diffAttributes(before: Record<string, unknown>, after: Record<string, unknown>, prefix = ""): AttributeChange[] {
  const diffs: AttributeChange[] = [];
  const allKeys = new Set([...Object.keys(before), ...Object.keys(after)]);

  for (const key of allKeys) {
    const path = prefix ? `${prefix}.${key}` : key;
    const bVal = before[key];
    const aVal = after[key];

    if (bVal === aVal) continue;

    if (isPlainObject(bVal) && isPlainObject(aVal)) {
      diffs.push(...diffAttributes(bVal, aVal, path));
    } else if (canonicalJson(bVal) !== canonicalJson(aVal)) {
      diffs.push({ path, before: bVal, after: aVal });
    }
  }

  return diffs;
}

/** Top-level attribute names touched by a set of changes. */
export function changedRoots(changes: AttributeChange[]): string[] {
  return [...new Set(changes.map((c) => c.path.split(".")[0]))];
}
