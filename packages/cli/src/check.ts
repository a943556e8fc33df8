/**
 * Line diffs for check mode, printed as:
 *
 *   Diff in README.md at line 3:
 *    unchanged context
 *   -line in the file today
 *   +line tocmark would write
 */
import { diffArrays } from 'diff';

export const DEFAULT_CONTEXT_SIZE = 3;

export type DiffLine =
  | { kind: 'context'; text: string }
  | { kind: 'removed'; text: string }
  | { kind: 'added'; text: string };

export interface Mismatch {
  /** First line of the hunk, counted in the original text. */
  lineNumber: number;
  lines: DiffLine[];
}

const LINE_PREFIX: Record<DiffLine['kind'], string> = {
  context: ' ',
  removed: '-',
  added: '+',
};

const LINE_BREAK_RE = /\r?\n/;

/**
 * Lines of `text` without their `\n` or `\r\n` endings. Text that ends with a
 * line break gets a final empty line, so a missing last newline shows up in
 * the diff.
 */
function splitLines(text: string): string[] {
  return text === '' ? [] : text.split(LINE_BREAK_RE);
}

/**
 * Groups the line changes between `original` and `updated` into hunks with
 * up to `contextSize` unchanged lines around each change.
 */
export function makeDiff(original: string, updated: string, contextSize = DEFAULT_CONTEXT_SIZE): Mismatch[] {
  const results: Mismatch[] = [];
  const contextQueue: string[] = [];
  let lineNumber = 1;
  let linesSinceMismatch = contextSize + 1;
  let mismatch: Mismatch = { lineNumber: 0, lines: [] };

  const openMismatch = (): void => {
    if (linesSinceMismatch >= contextSize && linesSinceMismatch > 0) {
      results.push(mismatch);
      mismatch = { lineNumber: lineNumber - contextQueue.length, lines: [] };
    }
    for (const text of contextQueue.splice(0)) {
      mismatch.lines.push({ kind: 'context', text });
    }
  };

  for (const change of diffArrays(splitLines(original), splitLines(updated))) {
    for (const text of change.value) {
      if (change.removed === true) {
        openMismatch();
        mismatch.lines.push({ kind: 'removed', text });
        lineNumber += 1;
        linesSinceMismatch = 0;
      } else if (change.added === true) {
        openMismatch();
        mismatch.lines.push({ kind: 'added', text });
        linesSinceMismatch = 0;
      } else {
        if (contextQueue.length >= contextSize) {
          contextQueue.shift();
        }
        if (linesSinceMismatch < contextSize) {
          mismatch.lines.push({ kind: 'context', text });
        } else if (contextSize > 0) {
          contextQueue.push(text);
        }
        lineNumber += 1;
        linesSinceMismatch += 1;
      }
    }
  }

  results.push(mismatch);
  // the first entry is the placeholder opened before any change
  results.shift();
  return results;
}

/**
 * Renders every hunk between `original` and `updated`; empty when they match.
 */
export function renderDiff(original: string, updated: string, source: string, contextSize = DEFAULT_CONTEXT_SIZE): string {
  let out = '';
  for (const mismatch of makeDiff(original, updated, contextSize)) {
    out += `Diff in ${source} at line ${String(mismatch.lineNumber)}:\n`;
    for (const line of mismatch.lines) {
      out += `${LINE_PREFIX[line.kind]}${line.text}\n`;
    }
  }
  return out;
}
