/**
 * Dependency tracking for one render pass.
 *
 * Tracked reads are buffered per open container and handed to the next node
 * created there. Reads still buffered when a container closes belong to the
 * container itself, so page-level reads land on the root.
 */

export class DependencyTracker {
  private readonly frames: Array<Set<string>> = [new Set()];
  private readonly edges = new Map<string, Set<string>>();

  record(instanceId: string): void {
    this.frames[this.frames.length - 1].add(instanceId);
  }

  /**
   * Attribute buffered reads to a freshly created node.
   */
  attribute(nodeId: string): void {
    this.drain(this.frames[this.frames.length - 1], nodeId);
  }

  enterContainer(): void {
    this.frames.push(new Set());
  }

  exitContainer(nodeId: string): void {
    const frame = this.frames.pop();
    if (frame && this.frames.length > 0) {
      this.drain(frame, nodeId);
    }
  }

  finish(rootId: string): DependencyMap {
    for (const frame of this.frames) {
      this.drain(frame, rootId);
    }
    return new DependencyMap(this.edges);
  }

  private drain(frame: Set<string>, nodeId: string): void {
    for (const instanceId of frame) {
      let nodes = this.edges.get(instanceId);
      if (!nodes) {
        nodes = new Set();
        this.edges.set(instanceId, nodes);
      }
      nodes.add(nodeId);
    }
    frame.clear();
  }
}

/**
 * State instance id -> ids of the nodes that read it during one render.
 */
export class DependencyMap {
  constructor(private readonly edges: ReadonlyMap<string, ReadonlySet<string>> = new Map()) {}

  dependentsOf(instanceId: string): ReadonlySet<string> {
    return this.edges.get(instanceId) ?? new Set();
  }

  affectedBy(instanceIds: Iterable<string>): Set<string> {
    const affected = new Set<string>();
    for (const instanceId of instanceIds) {
      for (const nodeId of this.dependentsOf(instanceId)) {
        affected.add(nodeId);
      }
    }
    return affected;
  }

  get size(): number {
    return this.edges.size;
  }

  toJSON(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const [instanceId, nodes] of this.edges) {
      result[instanceId] = [...nodes].sort();
    }
    return result;
  }
}
