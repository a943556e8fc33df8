import type { Heading } from './heading.js';
import { StringSink, type TocSink } from './sink.js';

export const TOC_FORMATS = ['alternating', 'asterisks', 'dashes', 'numbers', 'pluses'] as const;

export type BulletFormat = (typeof TOC_FORMATS)[number];

/**
 * A caller-chosen list marker, e.g. `{ custom: '★' }`.
 */
export interface CustomFormat {
  custom: string;
}

/**
 * How each table of contents line is marked:
 *
 * - `alternating`: `-`, `*`, `+` cycling with nesting depth
 * - `dashes`, `pluses`, `asterisks`: the same symbol at every depth
 * - `numbers`: `1.` on every line, leaving the numbering to the renderer
 * - `{ custom }`: any literal string
 */
export type TocFormat = BulletFormat | CustomFormat;

export const DEFAULT_TOC_FORMAT: BulletFormat = 'alternating';

const ALTERNATING_BULLETS = '-*+';

export function isBulletFormat(value: string): value is BulletFormat {
  return TOC_FORMATS.some((format) => format === value);
}

export function listMarker(format: TocFormat, level: number): string {
  if (typeof format === 'object') {
    return format.custom;
  }

  switch (format) {
    case 'alternating':
      return ALTERNATING_BULLETS.charAt((level - 1) % ALTERNATING_BULLETS.length);
    case 'dashes':
      return '-';
    case 'pluses':
      return '+';
    case 'asterisks':
      return '*';
    case 'numbers':
      return '1.';
  }
}

/**
 * Renders one table of contents line, including its line ending.
 *
 * Nested entries are indented by the marker width plus one per level, with
 * the width counted in code points so a symbol like `★` indents by 2.
 */
export function formatLine(heading: Heading, format: TocFormat): string {
  const marker = listMarker(format, heading.level);
  const indent = ' '.repeat((heading.level - 1) * (Array.from(marker).length + 1));
  return `${indent}${marker} ${heading.toString()}\n`;
}

/**
 * Writes one line per heading to `sink`. Each line is a single `write`; if
 * the sink throws, formatting stops there.
 */
export function formatHeadings(headings: Iterable<Heading>, format: TocFormat, sink: TocSink): void {
  for (const heading of headings) {
    sink.write(formatLine(heading, format));
  }
}

export function formatToc(headings: Iterable<Heading>, format: TocFormat = DEFAULT_TOC_FORMAT): string {
  const sink = new StringSink();
  formatHeadings(headings, format, sink);
  return sink.toString();
}
