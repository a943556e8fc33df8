import { slugify } from './normalize.js';

/**
 * Issues anchor slugs that are unique within one document.
 *
 * A repeated slug gets the smallest free `-N` suffix, so the second `Detail`
 * heading becomes `detail-1`. Results depend on call order: call `slug` once
 * per heading, in document order.
 */
export class AnchorSlugger {
  private readonly issued = new Set<string>();

  slug(text: string): string {
    return this.unique(slugify(text));
  }

  private unique(base: string): string {
    let candidate = base;
    for (let suffix = 1; this.issued.has(candidate); suffix += 1) {
      candidate = `${base}-${String(suffix)}`;
    }
    this.issued.add(candidate);
    return candidate;
  }
}
