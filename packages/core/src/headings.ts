import type { Heading as HeadingNode } from 'mdast';
import { invariant } from './errors.js';
import { endOffset, markdownEvents, startOffset } from './events.js';
import { Heading } from './heading.js';
import { titleize } from './normalize.js';
import { AnchorSlugger } from './slugger.js';

/**
 * Where the extractor is relative to the heading being read.
 *
 * The heading's end is known as soon as it opens, but the start of its raw
 * text is only known from the first node inside it.
 */
type ExtractState =
  | { kind: 'outside' }
  | { kind: 'opened'; level: number; end: number }
  | { kind: 'bounded'; level: number; start: number; end: number };

const LINE_BREAK_AHEAD_RE = /^[ \t]*\r?\n/;

/**
 * Yields every ATX and setext heading of a CommonMark document in source
 * order. Anchors are unique across the returned sequence.
 *
 * The sequence is lazy and can be consumed only once; call again for a fresh
 * pass over the same text.
 *
 * @example
 * const [first] = extractHeadings('# <blink>A Title</blink>');
 * first.level;  // 1
 * first.title;  // 'A Title'
 * first.anchor; // '#a-title'
 */
export function* extractHeadings(source: string): Generator<Heading, void, undefined> {
  const slugger = new AnchorSlugger();
  let state: ExtractState = { kind: 'outside' };

  for (const { kind, node } of markdownEvents(source)) {
    if (node.type === 'heading' && kind === 'enter') {
      state = { kind: 'opened', level: node.depth, end: rawTextEnd(source, node) };
      continue;
    }

    if (node.type === 'heading' && kind === 'exit' && state.kind !== 'outside') {
      // nothing inside the heading (`#` alone): an empty range at its end
      const { level, start, end } =
        state.kind === 'opened' ? { level: state.level, start: state.end, end: state.end } : state;
      state = { kind: 'outside' };

      const raw = trimLineEnding(sliceSource(source, start, end));
      yield new Heading(level, titleize(raw), `#${slugger.slug(raw)}`);
      continue;
    }

    if (state.kind === 'opened') {
      state = { kind: 'bounded', level: state.level, start: startOffset(node), end: state.end };
    }
  }
}

/**
 * The heading's end offset, except for setext headings where the underline
 * line (`===` or `---`) is left out.
 */
function rawTextEnd(source: string, node: HeadingNode): number {
  const end = endOffset(node);
  const last = node.children.at(-1);
  if (last === undefined) {
    return end;
  }

  const lastEnd = endOffset(last);
  return LINE_BREAK_AHEAD_RE.test(source.slice(lastEnd, end)) ? lastEnd : end;
}

function sliceSource(source: string, start: number, end: number): string {
  invariant(
    start >= 0 && start <= end && end <= source.length,
    `heading range ${String(start)}..${String(end)} is outside the source (length ${String(source.length)})`
  );
  return source.slice(start, end);
}

function trimLineEnding(raw: string): string {
  let trimmed = raw;
  if (trimmed.endsWith('\n')) {
    trimmed = trimmed.slice(0, -1);
  }
  if (trimmed.endsWith('\r')) {
    trimmed = trimmed.slice(0, -1);
  }
  return trimmed;
}
