/**
 * 等待图 (wait-for graph)
 * Arena-style directed graph: nodes are dense indices, edges are adjacency lists
 */
export class WaitForGraph {
  /** Index -> task id */
  private ids: string[] = [];
  /** Task id -> index */
  private indexOf: Map<string, number> = new Map();
  /** Outgoing edges per node index */
  private adjacency: number[][] = [];

  /**
   * Build a graph from (waiter, holder) pairs
   */
  static fromEdges(edges: ReadonlyArray<readonly [string, string]>): WaitForGraph {
    const graph = new WaitForGraph();
    for (const [from, to] of edges) {
      graph.addEdge(from, to);
    }
    return graph;
  }

  /**
   * Add a node if missing and return its index
   */
  addNode(id: string): number {
    const existing = this.indexOf.get(id);
    if (existing !== undefined) {
      return existing;
    }

    const index = this.ids.length;
    this.ids.push(id);
    this.indexOf.set(id, index);
    this.adjacency.push([]);
    return index;
  }

  /**
   * Add an edge meaning `from` waits for `to`
   */
  addEdge(from: string, to: string): void {
    const fromIndex = this.addNode(from);
    const toIndex = this.addNode(to);
    const neighbors = this.adjacency[fromIndex];
    if (!neighbors.includes(toIndex)) {
      neighbors.push(toIndex);
    }
  }

  getNodeCount(): number {
    return this.ids.length;
  }

  getEdgeCount(): number {
    return this.adjacency.reduce((sum, neighbors) => sum + neighbors.length, 0);
  }

  /**
   * 检测循环（DFS + 递归栈标记）
   */
  hasCycle(): boolean {
    return this.findCycle().length > 0;
  }

  /**
   * 查找一个循环
   * @returns task ids along the first cycle found, in wait order; empty if acyclic
   */
  findCycle(): string[] {
    const visited = new Array<boolean>(this.ids.length).fill(false);
    const onStack = new Array<boolean>(this.ids.length).fill(false);
    const path: number[] = [];
    let cycle: number[] = [];

    const dfs = (node: number): boolean => {
      visited[node] = true;
      onStack[node] = true;
      path.push(node);

      for (const neighbor of this.adjacency[node]) {
        if (!visited[neighbor]) {
          if (dfs(neighbor)) {
            return true;
          }
        } else if (onStack[neighbor]) {
          cycle = path.slice(path.indexOf(neighbor));
          return true;
        }
      }

      path.pop();
      onStack[node] = false;
      return false;
    };

    for (let node = 0; node < this.ids.length; node++) {
      if (!visited[node] && dfs(node)) {
        break;
      }
    }

    return cycle.map((index) => this.ids[index]);
  }
}
