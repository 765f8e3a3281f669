/**
 * Format patterns
 *
 * "Result: {x}" style patterns, compiled to regular expressions.
 * {{ and }} stand for literal braces; {name:spec} captures like {name}.
 * A name used twice must capture the same text both times.
 */

export interface FormatPattern {
  regex: RegExp;
  /** Placeholder names in capture-group order (index 0 is group 1) */
  names: string[];
}

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\\/]/g;

function escapeLiteral(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

/**
 * Compile a format pattern. Matching is anchored at the start and allows
 * trailing whitespace at the end.
 */
export function compileFormat(format: string, caseSensitive: boolean): FormatPattern {
  const names: string[] = [];
  const groupOf = new Map<string, number>();
  let body = '';
  let literal = '';

  for (let i = 0; i < format.length; i++) {
    const ch = format[i];
    const next = format[i + 1];

    if ((ch === '{' && next === '{') || (ch === '}' && next === '}')) {
      literal += ch;
      i++;
      continue;
    }

    if (ch === '{') {
      const close = format.indexOf('}', i + 1);
      if (close !== -1) {
        body += escapeLiteral(literal);
        literal = '';

        const field = format.slice(i + 1, close);
        const name = (field.split(':')[0] ?? '').trim();
        const existing = groupOf.get(name);
        if (name === '') {
          body += '(?:.+)';
        } else if (existing !== undefined) {
          body += `\\${existing}`;
        } else {
          names.push(name);
          groupOf.set(name, names.length);
          body += '(.+)';
        }
        i = close;
        continue;
      }
    }

    literal += ch;
  }
  body += escapeLiteral(literal);

  return {
    regex: new RegExp(`^${body}\\s*$`, caseSensitive ? 's' : 'si'),
    names,
  };
}

/**
 * Match text against a compiled pattern; returns the captured token for
 * each placeholder name, or null when the text does not match.
 */
export function matchFormat(pattern: FormatPattern, text: string): Record<string, string> | null {
  const match = pattern.regex.exec(text);
  if (!match) return null;

  const tokens: Record<string, string> = {};
  pattern.names.forEach((name, index) => {
    const token = match[index + 1];
    if (token !== undefined) tokens[name] = token;
  });
  return tokens;
}
