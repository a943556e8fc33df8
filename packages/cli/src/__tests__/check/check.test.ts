import { describe, test, expect } from 'vitest';
import { makeDiff, renderDiff } from '../../check.js';

describe('makeDiff', () => {
  test('should surround a single change with context', () => {
    const original = 'one\ntwo\nthree\nfour\nfive\n';
    const updated = 'one\ntwo\ntrois\nfour\nfive\n';

    expect(makeDiff(original, updated, 1)).toEqual([
      {
        lineNumber: 2,
        lines: [
          { kind: 'context', text: 'two' },
          { kind: 'removed', text: 'three' },
          { kind: 'added', text: 'trois' },
          { kind: 'context', text: 'four' },
        ],
      },
    ]);
  });

  test('should split distant changes into separate hunks', () => {
    const original = 'one\ntwo\nthree\nfour\nfive\nsix\nseven\n';
    const updated = 'one\ntwo\ntrois\nfour\ncinq\nsix\nseven\n';

    expect(makeDiff(original, updated, 1)).toEqual([
      {
        lineNumber: 2,
        lines: [
          { kind: 'context', text: 'two' },
          { kind: 'removed', text: 'three' },
          { kind: 'added', text: 'trois' },
          { kind: 'context', text: 'four' },
        ],
      },
      {
        lineNumber: 5,
        lines: [
          { kind: 'removed', text: 'five' },
          { kind: 'added', text: 'cinq' },
          { kind: 'context', text: 'six' },
        ],
      },
    ]);
  });

  test('should print only changed lines without context', () => {
    const original = 'one\ntwo\nthree\nfour\nfive\n';
    const updated = 'one\ntwo\ntrois\nfour\nfive\n';

    expect(makeDiff(original, updated, 0)).toEqual([
      {
        lineNumber: 3,
        lines: [
          { kind: 'removed', text: 'three' },
          { kind: 'added', text: 'trois' },
        ],
      },
    ]);
  });

  test('should report an added trailing newline', () => {
    const original = 'one\ntwo\nthree\nfour\nfive';
    const updated = 'one\ntwo\nthree\nfour\nfive\n';

    expect(makeDiff(original, updated, 1)).toEqual([
      {
        lineNumber: 5,
        lines: [
          { kind: 'context', text: 'five' },
          { kind: 'added', text: '' },
        ],
      },
    ]);
  });

  test('should compare CRLF lines without their line endings', () => {
    const original = 'one\r\ntwo\r\nthree\r\n';
    const updated = 'one\r\ntrois\r\nthree\r\n';

    expect(makeDiff(original, updated, 1)).toEqual([
      {
        lineNumber: 1,
        lines: [
          { kind: 'context', text: 'one' },
          { kind: 'removed', text: 'two' },
          { kind: 'added', text: 'trois' },
          { kind: 'context', text: 'three' },
        ],
      },
    ]);
  });

  test('should treat CRLF and LF line endings as equal', () => {
    expect(makeDiff('a\r\nb\r\n', 'a\nb\n')).toEqual([]);
  });

  test('should report every line added to empty text', () => {
    expect(makeDiff('', 'a\n', 1)).toEqual([
      {
        lineNumber: 1,
        lines: [
          { kind: 'added', text: 'a' },
          { kind: 'added', text: '' },
        ],
      },
    ]);
  });

  test('should return no hunks for identical text', () => {
    expect(makeDiff('one\ntwo\n', 'one\ntwo\n')).toEqual([]);
  });
});

describe('renderDiff', () => {
  test('should render a hunk with three lines of context', () => {
    const original = 'one\ntwo\nthree\nfour\nfive\n';
    const updated = 'one\ntwo\ntrois\nfour\nfive\n';

    expect(renderDiff(original, updated, '<src>')).toBe(
      'Diff in <src> at line 1:\n one\n two\n-three\n+trois\n four\n five\n \n'
    );
  });

  test('should render a CRLF document without carriage returns', () => {
    const original = '<!-- toc -->\r\n## A\r\n';
    const updated = '<!-- toc -->\r\n- [A](#a)\n## A\r\n';

    expect(renderDiff(original, updated, 'x.md')).toBe('Diff in x.md at line 1:\n <!-- toc -->\n+- [A](#a)\n ## A\n \n');
  });

  test('should render nothing for identical text', () => {
    expect(renderDiff('same\n', 'same\n', '<src>')).toBe('');
  });
});
