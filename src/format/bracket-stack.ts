/**
 * @module format/bracket-stack
 *
 * 开括号栈快照：不可变的持久化栈。
 *
 * 每个 Node 持有一份快照，push/pop 都返回新栈并共享未改动的部分，
 * 因此从任意 Node 子序列重建 Line 时不会互相影响。
 */

import type { Token } from '../types.js';
import { sameToken } from '../frontend/tokens.js';

export interface PopResult {
  readonly top: Token;
  readonly rest: BracketStack;
}

export class BracketStack {
  static readonly EMPTY: BracketStack = new BracketStack(null, null, 0);

  private constructor(
    private readonly head: Token | null,
    private readonly tail: BracketStack | null,
    readonly size: number
  ) {}

  static of(...tokens: readonly Token[]): BracketStack {
    return tokens.reduce<BracketStack>((stack, token) => stack.push(token), BracketStack.EMPTY);
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  peek(): Token | null {
    return this.head;
  }

  push(token: Token): BracketStack {
    return new BracketStack(token, this, this.size + 1);
  }

  /** 空栈返回 null */
  pop(): PopResult | null {
    if (this.head === null || this.tail === null) return null;
    return { top: this.head, rest: this.tail };
  }

  /** 自底向顶 */
  toArray(): Token[] {
    const out: Token[] = [];
    let cursor: BracketStack | null = this;
    while (cursor !== null && cursor.head !== null) {
      out.push(cursor.head);
      cursor = cursor.tail;
    }
    return out.reverse();
  }

  equals(other: BracketStack): boolean {
    let a: BracketStack | null = this;
    let b: BracketStack | null = other;
    if (a.size !== b.size) return false;
    while (a !== null && b !== null) {
      if (a === b) return true;
      if (a.head === null || b.head === null) return a.head === b.head;
      if (!sameToken(a.head, b.head)) return false;
      a = a.tail;
      b = b.tail;
    }
    return a === b;
  }
}
