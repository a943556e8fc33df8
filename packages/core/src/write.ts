import type { Parents } from 'mdast';
import { endOffset, markdownEvents, startOffset, type MarkdownEvent } from './events.js';
import type { TocSink } from './sink.js';

export const DEFAULT_BEGIN_MARKER = '<!-- toc -->';
export const DEFAULT_END_MARKER = '<!-- tocstop -->';

export interface TocMarkers {
  readonly beginMarker: string;
  readonly endMarker: string;
}

/**
 * Finds marker text in the raw HTML of a document, one match at a time.
 *
 * Only HTML blocks are searched. A marker inside a code span, a fenced block
 * or inline HTML within a paragraph is never matched. Successive searches continue
 * where the previous match ended.
 */
class RawHtmlScanner {
  private readonly events: Iterator<MarkdownEvent, void, undefined>;
  private resumeAt: { from: number; to: number } | undefined;

  constructor(private readonly source: string) {
    this.events = markdownEvents(source);
  }

  /**
   * Offset of `marker` in the next raw HTML span that contains it, or
   * `undefined` once the document is exhausted.
   */
  find(marker: string): number | undefined {
    if (this.resumeAt !== undefined) {
      const { from, to } = this.resumeAt;
      this.resumeAt = undefined;
      const found = this.search(marker, from, to);
      if (found !== undefined) {
        return found;
      }
    }

    for (let next = this.events.next(); next.done !== true; next = this.events.next()) {
      const { kind, node, parent } = next.value;
      if (kind !== 'enter' || node.type !== 'html' || !isHtmlBlock(parent)) {
        continue;
      }

      const found = this.search(marker, startOffset(node), endOffset(node));
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  }

  private search(marker: string, from: number, to: number): number | undefined {
    const index = this.source.slice(from, to).indexOf(marker);
    if (index === -1) {
      return undefined;
    }

    const start = from + index;
    this.resumeAt = { from: start + marker.length, to };
    return start;
  }
}

// containers whose html children are HTML blocks rather than inline HTML
const FLOW_CONTAINERS: ReadonlySet<Parents['type']> = new Set<Parents['type']>([
  'root',
  'blockquote',
  'listItem',
  'footnoteDefinition',
]);

function isHtmlBlock(parent: Parents | undefined): boolean {
  return parent !== undefined && FLOW_CONTAINERS.has(parent.type);
}

/**
 * Length of the line ending at `index` (`\n` or `\r\n`), or 0 when there is none.
 */
function lineEndingLength(source: string, index: number): number {
  if (source.startsWith('\r\n', index)) {
    return 2;
  }
  return source.startsWith('\n', index) ? 1 : 0;
}

/**
 * Offset just past the begin marker's line ending. A marker that does not end
 * its line does not count.
 */
function beginMarkerLineEnd(source: string, marker: string, scanner: RawHtmlScanner): number | undefined {
  const start = scanner.find(marker);
  if (start === undefined) {
    return undefined;
  }

  const afterMarker = start + marker.length;
  const eol = lineEndingLength(source, afterMarker);
  return eol === 0 ? undefined : afterMarker + eol;
}

/**
 * Offset where the end marker starts, provided a line ending follows it.
 */
function endMarkerStart(source: string, marker: string, scanner: RawHtmlScanner): number | undefined {
  const start = scanner.find(marker);
  if (start === undefined) {
    return undefined;
  }

  return lineEndingLength(source, start + marker.length) === 0 ? undefined : start;
}

/**
 * Writes `source` to `sink` with `toc` spliced in after the first begin marker.
 *
 * Everything up to and including the begin marker's line is copied, then a
 * blank line, the table of contents and another blank line. If an end marker
 * follows, copying resumes at it, replacing whatever sat between the markers.
 * Without one, the end marker is written and the rest of the document follows
 * unchanged. A document with no begin marker is copied through as is.
 *
 * Only the first begin marker is acted on; later marker pairs are ordinary
 * content. Splicing a document that already holds the current table of
 * contents reproduces it exactly.
 */
export function writeDocument(source: string, toc: string, markers: TocMarkers, sink: TocSink): void {
  const scanner = new RawHtmlScanner(source);

  const beginEnd = beginMarkerLineEnd(source, markers.beginMarker, scanner);
  if (beginEnd === undefined) {
    sink.write(source);
    return;
  }

  sink.write(source.slice(0, beginEnd));
  sink.write('\n');
  sink.write(toc);
  sink.write('\n');

  const endStart = endMarkerStart(source, markers.endMarker, scanner);
  if (endStart !== undefined) {
    sink.write(source.slice(endStart));
  } else {
    sink.write(`${markers.endMarker}\n`);
    sink.write(source.slice(beginEnd));
  }
}
