/**
 * Task Graph - DAG construction and topological sorting
 */

import type { Task } from './task';
import { CycleDetectedError, GraphStateError, UnknownNodeError } from './errors';
import type { Edge, GraphState, NodeId, TaskNode } from '../types';

export class TaskGraph {
  private nodes: Map<NodeId, TaskNode>;
  private taskData: Map<NodeId, Task>;
  private currentState: GraphState;

  constructor() {
    this.nodes = new Map();
    this.taskData = new Map();
    this.currentState = 'building';
  }

  /**
   * Register a task and return its node id. The id is the task name, with a
   * `#n` suffix when the name is already taken.
   */
  addNode(task: Task): NodeId {
    this.assertBuilding();

    let nodeId = task.name;
    for (let n = 2; this.nodes.has(nodeId); n++) {
      nodeId = `${task.name}#${n}`;
    }

    this.taskData.set(nodeId, task);
    this.nodes.set(nodeId, {
      nodeId,
      dependencies: new Set(),
      dependents: new Set(),
    });

    return nodeId;
  }

  /**
   * Declare that `to` may only start after `from` completed successfully.
   * Nothing is mutated when the edge is rejected.
   */
  addEdge(from: NodeId, to: NodeId): void {
    this.assertBuilding();

    const fromNode = this.requireNode(from);
    const toNode = this.requireNode(to);

    if (fromNode.dependents.has(to)) {
      return;
    }

    const path = this.findPath(to, from);
    if (path) {
      throw new CycleDetectedError(from, to, path);
    }

    fromNode.dependents.add(to);
    toNode.dependencies.add(from);
  }

  /**
   * Get a task by node id
   */
  getTask(nodeId: NodeId): Task | undefined {
    return this.taskData.get(nodeId);
  }

  has(nodeId: NodeId): boolean {
    return this.nodes.has(nodeId);
  }

  predecessors(nodeId: NodeId): NodeId[] {
    return Array.from(this.requireNode(nodeId).dependencies);
  }

  successors(nodeId: NodeId): NodeId[] {
    return Array.from(this.requireNode(nodeId).dependents);
  }

  /**
   * Nodes without incoming edges
   */
  roots(): NodeId[] {
    return Array.from(this.nodes.values())
      .filter((node) => node.dependencies.size === 0)
      .map((node) => node.nodeId);
  }

  edges(): Edge[] {
    const edges: Edge[] = [];
    for (const node of this.nodes.values()) {
      for (const dependentId of node.dependents) {
        edges.push({ from: node.nodeId, to: dependentId });
      }
    }
    return edges;
  }

  /**
   * Every node reachable from `nodeId`, excluding itself
   */
  descendants(nodeId: NodeId): NodeId[] {
    const visited = new Set<NodeId>();
    const stack = [...this.requireNode(nodeId).dependents];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      stack.push(...this.requireNode(current).dependents);
    }

    return Array.from(visited);
  }

  /**
   * Perform topological sort using Kahn's algorithm
   */
  topologicalSort(): NodeId[] {
    const inDegree = new Map<NodeId, number>();
    const queue: NodeId[] = [];
    const result: NodeId[] = [];

    for (const [nodeId, node] of this.nodes) {
      inDegree.set(nodeId, node.dependencies.size);
      if (node.dependencies.size === 0) {
        queue.push(nodeId);
      }
    }

    for (let i = 0; i < queue.length; i++) {
      const nodeId = queue[i];
      result.push(nodeId);

      for (const dependentId of this.requireNode(nodeId).dependents) {
        const newDegree = (inDegree.get(dependentId) ?? 0) - 1;
        inDegree.set(dependentId, newDegree);
        if (newDegree === 0) {
          queue.push(dependentId);
        }
      }
    }

    return result;
  }

  nodeIds(): NodeId[] {
    return Array.from(this.nodes.keys());
  }

  size(): number {
    return this.nodes.size;
  }

  get state(): GraphState {
    return this.currentState;
  }

  /**
   * Move the graph through building -> running -> finished.
   * Called by the executor; a graph runs at most once.
   */
  transition(next: Exclude<GraphState, 'building'>): void {
    const expected: GraphState = next === 'running' ? 'building' : 'running';
    if (this.currentState !== expected) {
      throw new GraphStateError(`Cannot move graph from ${this.currentState} to ${next}`);
    }
    this.currentState = next;
  }

  private requireNode(nodeId: NodeId): TaskNode {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new UnknownNodeError(nodeId);
    }
    return node;
  }

  private assertBuilding(): void {
    if (this.currentState !== 'building') {
      throw new GraphStateError(`Graph is ${this.currentState} and can no longer be modified`);
    }
  }

  /**
   * Depth-first search for a path source -> ... -> target along dependents
   */
  private findPath(source: NodeId, target: NodeId): NodeId[] | null {
    const visited = new Set<NodeId>();

    const visit = (nodeId: NodeId, path: NodeId[]): NodeId[] | null => {
      if (nodeId === target) return [...path, nodeId];
      if (visited.has(nodeId)) return null;
      visited.add(nodeId);

      for (const dependentId of this.requireNode(nodeId).dependents) {
        const found = visit(dependentId, [...path, nodeId]);
        if (found) return found;
      }
      return null;
    };

    return visit(source, []);
  }
}
