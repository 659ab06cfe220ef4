import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { BracketStack } from '../../../src/format/bracket-stack.js';
import { TokenKind } from '../../../src/types.js';
import { TestFactories } from '../../helpers/test-factories.js';

const paren = TestFactories.token(TokenKind.BRACKET_OPEN, '(', 0, 0);
const square = TestFactories.token(TokenKind.BRACKET_OPEN, '[', 0, 1);
const select = TestFactories.token(TokenKind.TOP_KEYWORD, 'select', 0, 2);

describe('BracketStack', () => {
  it('空栈 pop 返回 null', () => {
    assert.equal(BracketStack.EMPTY.pop(), null);
    assert.equal(BracketStack.EMPTY.peek(), null);
    assert.equal(BracketStack.EMPTY.isEmpty, true);
  });

  it('push 不修改原栈', () => {
    const base = BracketStack.of(paren);
    const pushed = base.push(square);

    assert.equal(base.size, 1);
    assert.equal(pushed.size, 2);
    assert.deepEqual(base.toArray(), [paren]);
    assert.deepEqual(pushed.toArray(), [paren, square]);
  });

  it('pop 返回栈顶与剩余部分', () => {
    const stack = BracketStack.of(paren, select);
    const popped = stack.pop();

    assert.ok(popped);
    assert.equal(popped.top, select);
    assert.deepEqual(popped.rest.toArray(), [paren]);
    assert.equal(stack.size, 2, '原栈保持不变');
  });

  it('按 token 的值比较相等', () => {
    const copy = TestFactories.token(TokenKind.BRACKET_OPEN, '(', 0, 0);

    assert.equal(BracketStack.of(paren).equals(BracketStack.of(copy)), true);
    assert.equal(BracketStack.of(paren).equals(BracketStack.of(square)), false);
    assert.equal(BracketStack.of(paren).equals(BracketStack.of(paren, select)), false);
    assert.equal(BracketStack.EMPTY.equals(BracketStack.of()), true);
  });
});
