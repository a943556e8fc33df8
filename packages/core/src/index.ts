export { InvariantError, invariant } from './errors.js';
export { titleize, slugify } from './normalize.js';
export { AnchorSlugger } from './slugger.js';
export {
  Heading,
  MIN_HEADING_LEVEL,
  MAX_HEADING_LEVEL,
  skipTopLevel,
  allHeadings,
  type HeadingSelection,
} from './heading.js';
export { extractHeadings } from './headings.js';
export { parseMarkdown, markdownEvents, type MarkdownEvent } from './events.js';
export {
  TOC_FORMATS,
  DEFAULT_TOC_FORMAT,
  isBulletFormat,
  listMarker,
  formatLine,
  formatHeadings,
  formatToc,
  type BulletFormat,
  type CustomFormat,
  type TocFormat,
} from './format.js';
export { StringSink, type TocSink } from './sink.js';
export { DEFAULT_BEGIN_MARKER, DEFAULT_END_MARKER, writeDocument, type TocMarkers } from './write.js';
export {
  DEFAULT_TOC_CONFIG,
  createTocConfig,
  renderTo,
  render,
  check,
  type TocConfig,
  type TocConfigOptions,
  type CheckResult,
} from './render.js';
