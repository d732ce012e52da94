/**
 * Search tree node for A* algorithm
 */

import { MoveAction } from '../domain/types.js';
import { WorldState } from '../state/world-state.js';

export interface SearchNode {
  world: WorldState;
  key: string;
  parent: SearchNode | null;
  action: MoveAction | null;
  cost: number;     // g(n) - cost from start
  priority: number; // f(n) = g(n) + h(n)
}

/**
 * Create a search node
 */
export function createSearchNode(
  world: WorldState,
  key: string,
  parent: SearchNode | null,
  action: MoveAction | null,
  cost: number,
  heuristic: number
): SearchNode {
  return {
    world,
    key,
    parent,
    action,
    cost,
    priority: cost + heuristic,
  };
}

/**
 * Extract the path of actions from root to this node
 */
export function extractActionPath(node: SearchNode): MoveAction[] {
  const actions: MoveAction[] = [];
  let current: SearchNode | null = node;

  while (current !== null) {
    if (current.action !== null) {
      actions.unshift(current.action);
    }
    current = current.parent;
  }

  return actions;
}

/**
 * Priority queue for A* search.
 * Equal priorities pop in insertion order, keeping the search deterministic.
 */
export class PriorityQueue<T extends { priority: number }> {
  private items: { item: T; sequence: number }[] = [];
  private counter = 0;

  push(item: T): void {
    // Binary heap insert
    this.items.push({ item, sequence: this.counter++ });
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result.item;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  private before(a: number, b: number): boolean {
    const x = this.items[a];
    const y = this.items[b];
    if (x.item.priority !== y.item.priority) {
      return x.item.priority < y.item.priority;
    }
    return x.sequence < y.sequence;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.before(index, parentIndex)) {
        break;
      }
      [this.items[parentIndex], this.items[index]] = [this.items[index], this.items[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < this.items.length && this.before(leftChild, smallest)) {
        smallest = leftChild;
      }

      if (rightChild < this.items.length && this.before(rightChild, smallest)) {
        smallest = rightChild;
      }

      if (smallest === index) break;

      [this.items[smallest], this.items[index]] = [this.items[index], this.items[smallest]];
      index = smallest;
    }
  }
}
