/**
 * server/minify.ts
 *
 * Optional HTML shrinking applied before a link is encoded.
 *
 * Only comments and redundant whitespace are removed:
 * - <pre> and <textarea> bodies are left exactly as written
 * - <script> keeps one line break wherever it had any, so automatic
 *   semicolon insertion still sees the same statements; string, template and
 *   regex literals are copied unchanged
 * - tag attributes are never touched (src="//cdn..." stays intact)
 */

const RAW_TEXT_BLOCK = /<(script|style|pre|textarea)\b[^>]*>([\s\S]*?)<\/\1\s*>/gi;

const HTML_COMMENT = /<!--[\s\S]*?-->/g;

const CSS_COMMENT = /\/\*[\s\S]*?\*\//g;

/**
 * Characters after which a `/` starts a regular expression literal rather
 * than a division.
 */
const REGEX_PRECEDERS = new Set(['', '(', ',', '=', ':', '[', '!', '&', '|', '?', '{', '}', ';', '+', '-', '*', '%', '<', '>', '~', '^']);

function collapseMarkup(markup: string): string {
  return markup.replace(HTML_COMMENT, '').replace(/\s+/g, ' ');
}

function minifyStyle(css: string): string {
  return css.replace(CSS_COMMENT, '').replace(/\s+/g, ' ').trim();
}

/**
 * Index just past the closing quote of the string starting at `start`.
 */
function skipString(js: string, start: number): number {
  const quote = js[start];
  let i = start + 1;
  while (i < js.length) {
    const ch = js[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    i++;
    if (ch === quote) break;
  }
  return i;
}

/**
 * Index just past the closing slash (and flags) of the regex literal
 * starting at `start`.
 */
function skipRegex(js: string, start: number): number {
  let i = start + 1;
  let inClass = false;
  while (i < js.length) {
    const ch = js[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '\n') break;
    i++;
    if (ch === '[') inClass = true;
    else if (ch === ']') inClass = false;
    else if (ch === '/' && !inClass) break;
  }
  while (i < js.length && /[a-z]/i.test(js.charAt(i))) i++;
  return i;
}

/**
 * Removes JS comments that sit outside string, template and regex literals.
 */
export function stripScriptComments(js: string): string {
  let out = '';
  let i = 0;
  let last = '';

  while (i < js.length) {
    const ch = js.charAt(i);
    const next = js.charAt(i + 1);

    if (ch === '"' || ch === "'" || ch === '`') {
      const end = skipString(js, i);
      out += js.slice(i, end);
      i = end;
      last = ch;
      continue;
    }

    if (ch === '/' && next === '/') {
      const newline = js.indexOf('\n', i);
      i = newline < 0 ? js.length : newline;
      continue;
    }

    if (ch === '/' && next === '*') {
      const close = js.indexOf('*/', i + 2);
      i = close < 0 ? js.length : close + 2;
      out += ' ';
      continue;
    }

    if (ch === '/' && REGEX_PRECEDERS.has(last)) {
      const end = skipRegex(js, i);
      out += js.slice(i, end);
      i = end;
      last = '/';
      continue;
    }

    out += ch;
    if (!/\s/.test(ch)) last = ch;
    i++;
  }

  return out;
}

/**
 * Collapses whitespace outside string, template and regex literals. A run
 * that contains a line break becomes one line break, any other run one space.
 */
export function collapseScriptWhitespace(js: string): string {
  let out = '';
  let pending = '';
  let i = 0;
  let last = '';

  while (i < js.length) {
    const ch = js.charAt(i);

    if (/\s/.test(ch)) {
      if (ch === '\n') pending = '\n';
      else if (pending === '') pending = ' ';
      i++;
      continue;
    }

    let end = i + 1;
    if (ch === '"' || ch === "'" || ch === '`') {
      end = skipString(js, i);
      last = ch;
    } else if (ch === '/' && REGEX_PRECEDERS.has(last)) {
      end = skipRegex(js, i);
      last = '/';
    } else {
      last = ch;
    }

    if (out.length > 0) out += pending;
    pending = '';
    out += js.slice(i, end);
    i = end;
  }

  return out;
}

function minifyScript(js: string): string {
  return collapseScriptWhitespace(stripScriptComments(js));
}

/**
 * Strips comments and collapses whitespace.
 *
 * @example
 * minifyHtml('<div>\n  <!-- note -->\n  <p>  Hi  </p>\n</div>')
 * // => '<div> <p> Hi </p> </div>'
 */
export function minifyHtml(html: string): string {
  let out = '';
  let cursor = 0;

  for (const match of html.matchAll(RAW_TEXT_BLOCK)) {
    const [block, rawTag, body] = match;
    const tag = rawTag.toLowerCase();
    const start = match.index ?? 0;

    out += collapseMarkup(html.slice(cursor, start));
    cursor = start + block.length;

    const openEnd = block.indexOf('>') + 1;
    const openTag = block.slice(0, openEnd);
    const closeTag = block.slice(openEnd + body.length);

    if (tag === 'script') {
      out += openTag + minifyScript(body) + closeTag;
    } else if (tag === 'style') {
      out += openTag + minifyStyle(body) + closeTag;
    } else {
      out += block;
    }
  }

  out += collapseMarkup(html.slice(cursor));
  return out.trim();
}
