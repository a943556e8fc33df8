import { invariant } from './errors.js';

export const MIN_HEADING_LEVEL = 1;
export const MAX_HEADING_LEVEL = 6;

/**
 * A heading found in a Markdown document: its level, display title and
 * anchor link. Headings are immutable; `promote` and `demote` return copies.
 */
export class Heading {
  readonly level: number;
  readonly title: string;
  readonly anchor: string;

  constructor(level: number, title: string, anchor: string) {
    invariant(
      Number.isInteger(level) && level >= MIN_HEADING_LEVEL && level <= MAX_HEADING_LEVEL,
      `heading level must be between ${String(MIN_HEADING_LEVEL)} and ${String(MAX_HEADING_LEVEL)}, got ${String(level)}`
    );
    invariant(anchor.startsWith('#'), `heading anchor must start with "#", got ${JSON.stringify(anchor)}`);

    this.level = level;
    this.title = title;
    this.anchor = anchor;
  }

  /**
   * One level up (`###` becomes `##`), stopping at level 1.
   */
  promote(): Heading {
    return new Heading(Math.max(this.level - 1, MIN_HEADING_LEVEL), this.title, this.anchor);
  }

  /**
   * One level down (`##` becomes `###`), stopping at level 6.
   */
  demote(): Heading {
    return new Heading(Math.min(this.level + 1, MAX_HEADING_LEVEL), this.title, this.anchor);
  }

  /**
   * The heading as a Markdown link, e.g. `[Intro](#intro)`.
   */
  toString(): string {
    return `[${this.title}](${this.anchor})`;
  }
}

/**
 * Chooses and reshapes the headings that end up in a table of contents.
 */
export type HeadingSelection = (headings: Iterable<Heading>) => Iterable<Heading>;

/**
 * Drops every level 1 heading (usually the document title) and promotes the
 * rest, so `##` entries sit at the top of the list.
 */
export function* skipTopLevel(headings: Iterable<Heading>): Generator<Heading, void, undefined> {
  for (const heading of headings) {
    if (heading.level > MIN_HEADING_LEVEL) {
      yield heading.promote();
    }
  }
}

export function allHeadings(headings: Iterable<Heading>): Iterable<Heading> {
  return headings;
}
