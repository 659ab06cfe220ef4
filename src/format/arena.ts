/**
 * @module format/arena
 *
 * 一次查询内所有 Node 的存储区。Node 之间用下标而非引用相连，
 * 前驱查找为 O(1)，且不会形成所有权环。
 */

import type { Token } from '../types.js';
import { createNode, type Node } from './node.js';

export class NodeArena {
  private readonly nodes: Node[] = [];

  get size(): number {
    return this.nodes.length;
  }

  get(index: number): Node {
    const node = this.nodes[index];
    if (node === undefined) {
      throw new RangeError(`Node index ${index} is outside the arena (size ${this.nodes.length})`);
    }
    return node;
  }

  /**
   * 以 previous 为前驱创建并存储新 Node。previous 必须来自同一个 arena。
   */
  append(token: Token, previous: Node | null): Node {
    if (previous !== null && this.nodes[previous.index] !== previous) {
      throw new Error(`Node ${previous.index} does not belong to this arena`);
    }
    const node = createNode(token, previous, this.nodes.length);
    this.nodes.push(node);
    return node;
  }

  previousOf(node: Node): Node | null {
    return node.previous === null ? null : this.get(node.previous);
  }
}
