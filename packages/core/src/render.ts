import { DEFAULT_TOC_FORMAT, formatToc, type TocFormat } from './format.js';
import { skipTopLevel, type HeadingSelection } from './heading.js';
import { extractHeadings } from './headings.js';
import { StringSink, type TocSink } from './sink.js';
import { DEFAULT_BEGIN_MARKER, DEFAULT_END_MARKER, writeDocument, type TocMarkers } from './write.js';

/**
 * Everything that shapes a rendered table of contents. Build one with
 * `createTocConfig` and reuse it for any number of documents.
 */
export interface TocConfig extends TocMarkers {
  readonly format: TocFormat;
  readonly select: HeadingSelection;
}

export interface TocConfigOptions {
  beginMarker?: string | undefined;
  endMarker?: string | undefined;
  format?: TocFormat | undefined;
  select?: HeadingSelection | undefined;
}

export const DEFAULT_TOC_CONFIG: TocConfig = Object.freeze({
  beginMarker: DEFAULT_BEGIN_MARKER,
  endMarker: DEFAULT_END_MARKER,
  format: DEFAULT_TOC_FORMAT,
  select: skipTopLevel,
});

export function createTocConfig(options: TocConfigOptions = {}): TocConfig {
  return Object.freeze({
    beginMarker: options.beginMarker ?? DEFAULT_TOC_CONFIG.beginMarker,
    endMarker: options.endMarker ?? DEFAULT_TOC_CONFIG.endMarker,
    format: options.format ?? DEFAULT_TOC_CONFIG.format,
    select: options.select ?? DEFAULT_TOC_CONFIG.select,
  });
}

/**
 * Extracts, selects and formats the headings of `source`, then splices the
 * result between the configured markers and writes the document to `sink`.
 */
export function renderTo(config: TocConfig, source: string, sink: TocSink): void {
  const toc = formatToc(config.select(extractHeadings(source)), config.format);
  writeDocument(source, toc, config, sink);
}

/**
 * Returns `source` with its table of contents inserted or brought up to date.
 *
 * @example
 * render(DEFAULT_TOC_CONFIG, '<!-- toc -->\n\n# Title\n## Intro\n');
 * // '<!-- toc -->\n\n- [Intro](#intro)\n\n<!-- tocstop -->\n\n# Title\n## Intro\n'
 */
export function render(config: TocConfig, source: string): string {
  const sink = new StringSink();
  renderTo(config, source, sink);
  return sink.toString();
}

export interface CheckResult {
  output: string;
  changed: boolean;
}

/**
 * Renders without writing anywhere and reports whether the document would change.
 */
export function check(config: TocConfig, source: string): CheckResult {
  const output = render(config, source);
  return { output, changed: output !== source };
}
