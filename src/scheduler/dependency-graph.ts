/**
 * Forward edges (task → what it waits on) and reverse edges (task → who waits
 * on it). Callers check findCycle before adding edges; the graph itself never
 * holds a cycle.
 */
export class DependencyGraph {
  private readonly dependencies = new Map<string, Set<string>>();
  private readonly dependents = new Map<string, Set<string>>();

  addNode(taskId: string, dependencyIds: Iterable<string> = []): void {
    if (!this.dependencies.has(taskId)) this.dependencies.set(taskId, new Set());
    if (!this.dependents.has(taskId)) this.dependents.set(taskId, new Set());
    for (const dependencyId of dependencyIds) this.addEdge(taskId, dependencyId);
  }

  addEdge(taskId: string, dependencyId: string): void {
    this.ensure(this.dependencies, taskId).add(dependencyId);
    this.ensure(this.dependents, dependencyId).add(taskId);
  }

  dependentsOf(taskId: string): string[] {
    return [...(this.dependents.get(taskId) ?? [])];
  }

  /**
   * Depth-first walk from taskId through the proposed dependencies and then
   * the existing dependency sets. Returns the cycle path (starting and ending
   * at taskId) if taskId is reachable again, else null. Iterative, so chain
   * depth is bounded by memory rather than the call stack.
   */
  findCycle(taskId: string, proposedDependencies: Iterable<string>): string[] | null {
    // node -> the node it was reached from; doubles as the visited set
    const parent = new Map<string, string>();

    for (const start of proposedDependencies) {
      if (start === taskId) return [taskId, taskId];
      if (parent.has(start)) continue;
      parent.set(start, taskId);

      const stack: Array<{ node: string; edges: Iterator<string> }> = [
        { node: start, edges: this.edgesOf(start) },
      ];
      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const step = frame.edges.next();
        if (step.done) {
          stack.pop();
          continue;
        }
        const next = step.value;
        if (next === taskId) return this.pathBack(taskId, frame.node, parent);
        if (parent.has(next)) continue;
        parent.set(next, frame.node);
        stack.push({ node: next, edges: this.edgesOf(next) });
      }
    }
    return null;
  }

  /** Every task that transitively depends on taskId, breadth-first, without taskId itself. */
  transitiveDependents(taskId: string): string[] {
    const seen = new Set<string>([taskId]);
    const order: string[] = [];
    const queue = [taskId];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const dependent of this.dependents.get(current) ?? []) {
        if (seen.has(dependent)) continue;
        seen.add(dependent);
        order.push(dependent);
        queue.push(dependent);
      }
    }
    return order;
  }

  private edgesOf(taskId: string): Iterator<string> {
    return (this.dependencies.get(taskId) ?? new Set<string>()).values();
  }

  private pathBack(taskId: string, last: string, parent: Map<string, string>): string[] {
    const reversed: string[] = [];
    for (let at: string | undefined = last; at !== undefined && at !== taskId; at = parent.get(at)) {
      reversed.push(at);
    }
    return [taskId, ...reversed.reverse(), taskId];
  }

  private ensure(map: Map<string, Set<string>>, key: string): Set<string> {
    let set = map.get(key);
    if (!set) {
      set = new Set();
      map.set(key, set);
    }
    return set;
  }
}
