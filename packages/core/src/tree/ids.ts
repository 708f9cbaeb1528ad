/**
 * Node id derivation.
 *
 * Keyed children: `parent/kind[key]`. Unkeyed children: `parent/kindN`, where
 * N counts the earlier unkeyed siblings of the same kind. Unkeyed lists
 * therefore keep positional identity.
 */

export const ROOT_NODE_ID = "root";

export class ChildIdAllocator {
  private readonly counts = new Map<string, number>();
  private readonly keys = new Set<string>();

  constructor(readonly parentId: string) {}

  /**
   * @returns the id, or `null` when the key is already taken by a sibling
   */
  next(kind: string, key?: string): string | null {
    if (key !== undefined) {
      if (this.keys.has(key)) {
        return null;
      }
      this.keys.add(key);
      return `${this.parentId}/${kind}[${encodeURIComponent(key)}]`;
    }
    const n = this.counts.get(kind) ?? 0;
    this.counts.set(kind, n + 1);
    return `${this.parentId}/${kind}${n}`;
  }
}
