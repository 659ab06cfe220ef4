import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildQuery, formatSql, renderQuery, summarizeLines } from '../../../src/format/query.js';
import { lex } from '../../../src/frontend/lexer.js';
import { UnmatchedCloserError } from '../../../src/diagnostics/diagnostics.js';

function query(source: string) {
  return buildQuery(source, lex(source));
}

describe('buildQuery', () => {
  it('按换行切分为行，行之间通过 previousNode 相连', () => {
    const q = query('SELECT a, b\nFROM t\n');
    assert.equal(q.lines.length, 2);
    const [first, second] = q.lines;
    assert.ok(first && second);

    assert.equal(first.firstComma, 2);
    assert.equal(second.startsWithTopKeyword, true);
    assert.equal(second.previousNode, first.lastNode);
    assert.equal(q.arena.size, 8);
  });

  it('最后一行缺少换行时补上', () => {
    const q = query('select a\nfrom t');
    assert.equal(q.lines.length, 2);
    assert.equal(q.lines[1]?.render(), 'from t\n');
  });

  it('空输入没有行', () => {
    const q = buildQuery('', []);
    assert.equal(q.lines.length, 0);
    assert.equal(renderQuery(q), '');
  });

  it('把拆分策略传给每一行', () => {
    const q = buildQuery('select a\n', lex('select a\n'), { splitPolicy: () => false });
    assert.equal(q.lines[0]?.depthSplit, 0);
  });

  it('summarizeLines 汇总每行的深度与拆分标记', () => {
    assert.deepEqual(summarizeLines(query('select a, b\nfrom t\n')), [
      { number: 1, depth: 0, changeInDepth: 1, depthSplit: 1, firstComma: 2, text: 'select a, b\n' },
      { number: 2, depth: 0, changeInDepth: 1, depthSplit: 1, firstComma: null, text: 'from t\n' },
    ]);
  });
});

describe('formatSql', () => {
  it('小写关键字并规范空白', () => {
    assert.equal(formatSql('SELECT  A ,B\nFROM   T'), 'select a, b\nfrom t\n');
  });

  it('函数调用参数缩进一级，闭括号回到调用所在层级', () => {
    const out = formatSql('select\nfoo(\nbar\n)\n');
    assert.equal(out, 'select\n    foo(\n        bar\n    )\n');
    assert.equal(query('select\nfoo(\nbar\n)\n').lines[1]?.depthSplit, 2);
  });

  it('select foo( 同一行时在 select 之后拆分', () => {
    const source = 'select foo(\n  bar\n)';
    const q = query(source);
    assert.equal(q.lines[0]?.depthSplit, 1);
    assert.equal(q.lines[0]?.changeInDepth, 2);
    assert.equal(renderQuery(q), 'select foo(\n        bar\n    )\n');
  });

  it('多词关键字被换行分开时各自成行', () => {
    assert.equal(query('order\nby x\n').lines.length, 2);
  });

  it('子查询中的顶层关键字随闭括号关闭', () => {
    const source = 'select *\nfrom (\nselect a\nfrom t\n) as s\nwhere x = 1\n';
    assert.equal(
      formatSql(source),
      'select *\nfrom (\n        select a\n        from t\n    ) as s\nwhere x = 1\n'
    );
  });

  it('case 与 end 之间缩进一级', () => {
    const source = 'select\ncase\nwhen a then 1\nelse 2\nend as c\nfrom t\n';
    assert.equal(
      formatSql(source),
      'select\n    case\n        when a then 1\n        else 2\n    end as c\nfrom t\n'
    );
  });

  it('保留引号名称与注释的原始大小写', () => {
    assert.equal(formatSql('SELECT "Foo".Bar -- Keep Case\n'), 'select "Foo".bar -- Keep Case\n');
  });

  it('多余的闭括号抛出 UnmatchedCloserError', () => {
    assert.throws(
      () => formatSql('select a)\n'),
      (error: unknown) => {
        assert.ok(error instanceof UnmatchedCloserError);
        assert.deepEqual(error.pos, { line: 0, col: 8 });
        return true;
      }
    );
  });
});
