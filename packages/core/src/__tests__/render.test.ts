import { describe, test, expect } from 'vitest';
import { allHeadings, type Heading } from '../heading.js';
import { DEFAULT_TOC_CONFIG, check, createTocConfig, render, renderTo } from '../render.js';

const DOC = `<!-- toc -->

# Title
## Intro
## Body
### Detail
## Conclusion
`;

const EXPECTED = `<!-- toc -->

- [Intro](#intro)
- [Body](#body)
  * [Detail](#detail)
- [Conclusion](#conclusion)

<!-- tocstop -->

# Title
## Intro
## Body
### Detail
## Conclusion
`;

describe('render', () => {
  test('should skip the title and promote the rest by default', () => {
    expect(render(DEFAULT_TOC_CONFIG, '<!-- toc -->\n\n# Title\n## Intro\nHello.\n')).toBe(
      '<!-- toc -->\n\n- [Intro](#intro)\n\n<!-- tocstop -->\n\n# Title\n## Intro\nHello.\n'
    );
  });

  test('should render a nested toc', () => {
    expect(render(DEFAULT_TOC_CONFIG, DOC)).toBe(EXPECTED);
  });

  test('should reproduce its own output', () => {
    const once = render(DEFAULT_TOC_CONFIG, DOC);

    expect(render(DEFAULT_TOC_CONFIG, once)).toBe(once);
  });

  test('should copy a document without a begin marker for every format', () => {
    const md = '# Title\n## Intro\n## Body\n';

    for (const format of ['alternating', 'dashes', 'numbers', { custom: '★' }] as const) {
      expect(render(createTocConfig({ format }), md)).toBe(md);
    }
  });

  test('should keep content outside the markers byte for byte', () => {
    const before = 'Preface with `code`  and trailing spaces  \r\n\r\n';
    const after = '\n# Title\n## Intro\n\n```\n<!-- toc -->\n```\n';
    const md = `${before}<!-- toc -->\n- stale\n<!-- tocstop -->${after}`;

    const output = render(DEFAULT_TOC_CONFIG, md);

    expect(output.startsWith(`${before}<!-- toc -->\n`)).toBe(true);
    expect(output.endsWith(`<!-- tocstop -->${after}`)).toBe(true);
  });

  test('should use numbers when configured', () => {
    expect(render(createTocConfig({ format: 'numbers' }), DOC)).toBe(`<!-- toc -->

1. [Intro](#intro)
1. [Body](#body)
   1. [Detail](#detail)
1. [Conclusion](#conclusion)

<!-- tocstop -->

# Title
## Intro
## Body
### Detail
## Conclusion
`);
  });

  test('should list every heading with allHeadings', () => {
    expect(render(createTocConfig({ select: allHeadings }), DOC)).toBe(`<!-- toc -->

- [Title](#title)
  * [Intro](#intro)
  * [Body](#body)
    + [Detail](#detail)
  * [Conclusion](#conclusion)

<!-- tocstop -->

# Title
## Intro
## Body
### Detail
## Conclusion
`);
  });

  test('should apply a custom selection', () => {
    function* levelTwoOnly(headings: Iterable<Heading>): Generator<Heading> {
      for (const heading of headings) {
        if (heading.level === 2) {
          yield heading.promote();
        }
      }
    }

    expect(render(createTocConfig({ select: levelTwoOnly }), DOC)).toBe(`<!-- toc -->

- [Intro](#intro)
- [Body](#body)
- [Conclusion](#conclusion)

<!-- tocstop -->

# Title
## Intro
## Body
### Detail
## Conclusion
`);
  });

  test('should write an empty toc when there is nothing to list', () => {
    expect(render(DEFAULT_TOC_CONFIG, '<!-- toc -->\n\n# Title only\n')).toBe(
      '<!-- toc -->\n\n\n<!-- tocstop -->\n\n# Title only\n'
    );
  });

  test('renderTo should write to the given sink', () => {
    const chunks: string[] = [];
    renderTo(DEFAULT_TOC_CONFIG, '# Title\n', { write: (chunk) => chunks.push(chunk) });

    expect(chunks).toEqual(['# Title\n']);
  });
});

describe('createTocConfig', () => {
  test('should fall back to defaults', () => {
    const config = createTocConfig({ endMarker: '<!-- stop -->', format: undefined });

    expect(config.beginMarker).toBe('<!-- toc -->');
    expect(config.endMarker).toBe('<!-- stop -->');
    expect(config.format).toBe('alternating');
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('check', () => {
  test('should report a document that would change', () => {
    const result = check(DEFAULT_TOC_CONFIG, DOC);

    expect(result.changed).toBe(true);
    expect(result.output).toBe(EXPECTED);
  });

  test('should report an up to date document as unchanged', () => {
    expect(check(DEFAULT_TOC_CONFIG, EXPECTED)).toEqual({ output: EXPECTED, changed: false });
  });
});
