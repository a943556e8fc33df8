const HTML_TAG_RE = /<\/?[^>]+>/g;

// ASCII punctuation and symbols first, then CJK punctuation marks
const INVALID_CHARS_RE =
  /[|$&`~=\\\/@+*!?({[\]})<>.,;:'"^%#。？！，、；：“”【】（）〔〕［］﹃﹄‘’﹁﹂—…－～《》〈〉「」]/g;

const WHITESPACE_RE = /\p{White_Space}+/u;

/**
 * Turns raw heading text into its display title.
 *
 * HTML tags are dropped and whitespace runs (line endings included) collapse
 * to one space. Case, punctuation and non-Latin scripts are left alone.
 *
 * @example
 * titleize('<blink>A   Title</blink>'); // 'A Title'
 */
export function titleize(text: string): string {
  return text
    .replace(HTML_TAG_RE, '')
    .split(WHITESPACE_RE)
    .filter((word) => word !== '')
    .join(' ');
}

/**
 * Turns raw heading text into an anchor slug (without the leading `#`).
 *
 * Emphasis markers such as `_x_` are not interpreted, so `_` survives while
 * `*` is dropped as a symbol. Existing links to documents depend on that.
 *
 * @example
 * slugify('Foo & Bar'); // 'foo--bar'
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replaceAll(' ', '-')
    .replace(HTML_TAG_RE, '')
    .replace(INVALID_CHARS_RE, '');
}
