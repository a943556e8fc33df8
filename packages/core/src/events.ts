import { unified } from 'unified';
import remarkParse from 'remark-parse';
import type { Nodes, Parents, Root } from 'mdast';
import { invariant } from './errors.js';

/**
 * One step of a depth-first walk over the Markdown syntax tree. Every node
 * produces an `enter` event, the events of its children, then an `exit` event.
 */
export interface MarkdownEvent {
  kind: 'enter' | 'exit';
  node: Nodes;
  /** Undefined for the root. */
  parent: Parents | undefined;
}

const parser = unified().use(remarkParse);

export function parseMarkdown(source: string): Root {
  return parser.parse(source);
}

/**
 * Parses `source` and streams its nodes in document order.
 */
export function markdownEvents(source: string): Generator<MarkdownEvent, void, undefined> {
  return walk(parseMarkdown(source), undefined);
}

function* walk(node: Nodes, parent: Parents | undefined): Generator<MarkdownEvent, void, undefined> {
  yield { kind: 'enter', node, parent };
  if ('children' in node) {
    for (const child of node.children) {
      yield* walk(child, node);
    }
  }
  yield { kind: 'exit', node, parent };
}

export function startOffset(node: Nodes): number {
  const offset = node.position?.start.offset;
  invariant(offset !== undefined, `${node.type} node has no start offset`);
  return offset;
}

export function endOffset(node: Nodes): number {
  const offset = node.position?.end.offset;
  invariant(offset !== undefined, `${node.type} node has no end offset`);
  return offset;
}
