/**
 * Tolerant JSON Repair
 *
 * Fixes the malformations models commonly produce, in a fixed order:
 * smart quotes, comments, unescaped inner quotes, trailing commas, then
 * unclosed brackets. Each step is a pure string transform; the result is
 * not guaranteed to parse.
 *
 * @module @worldgrade/engine/parser/repair
 */

const SMART_DOUBLE = /[“”„‟″«»]/g;
const SMART_SINGLE = /[‘’‚‛]/g;

export function normalizeSmartQuotes(text: string): string {
  return text.replace(SMART_DOUBLE, '"').replace(SMART_SINGLE, "'");
}

/**
 * Remove `//` line comments and `/* *\/` block comments outside strings
 */
export function stripComments(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const next = text[i + 1];

    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      out += ch;
    } else if (ch === '/' && next === '/') {
      const newline = text.indexOf('\n', i);
      i = newline === -1 ? text.length : newline - 1;
    } else if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      i = close === -1 ? text.length : close + 1;
    } else {
      out += ch;
    }
  }
  return out;
}

function nextSignificant(text: string, from: number): string {
  for (let i = from; i < text.length; i++) {
    if (!/\s/.test(text[i])) return text[i];
  }
  return '';
}

/**
 * Escape quotes inside string literals. A quote closes a string only when
 * the next significant character is `,` `:` `}` `]` or the end of input.
 */
export function escapeInnerQuotes(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (!inString) {
      if (ch === '"') inString = true;
      out += ch;
      continue;
    }

    if (escaped) {
      escaped = false;
      out += ch;
    } else if (ch === '\\') {
      escaped = true;
      out += ch;
    } else if (ch === '"') {
      const after = nextSignificant(text, i + 1);
      if (after === '' || ',:}]'.includes(after)) {
        inString = false;
        out += ch;
      } else {
        out += '\\"';
      }
    } else if (ch === '\n') {
      out += '\\n';
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Drop commas directly followed by a closing bracket or brace
 */
export function removeTrailingCommas(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === ',') {
      const after = nextSignificant(text, i + 1);
      if (after === '}' || after === ']') continue;
    }
    out += ch;
  }
  return out;
}

const DANGLING_KEY = /(,|\{)\s*"(?:[^"\\]|\\.)*"\s*:?\s*$/;

/**
 * Close an unterminated string and every open bracket, dropping a
 * dangling comma or key left by truncation
 */
export function closeBrackets(text: string): string {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if ((ch === '}' || ch === ']') && stack[stack.length - 1] === ch) stack.pop();
  }

  let out = inString ? `${text}"` : text;
  if (stack.length === 0) {
    return out;
  }

  if (stack[stack.length - 1] === '}') {
    const dangling = DANGLING_KEY.exec(out);
    if (dangling) {
      out = out.slice(0, dangling.index) + (dangling[1] === '{' ? '{' : '');
    }
  }
  out = out.replace(/[\s,]+$/, '');

  return out + [...stack].reverse().join('');
}

/**
 * Run every repair step in order
 */
export function repairJson(text: string): string {
  return closeBrackets(removeTrailingCommas(escapeInnerQuotes(stripComments(normalizeSmartQuotes(text)))));
}
