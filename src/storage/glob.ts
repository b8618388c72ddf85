/**
 * Redis-style glob matching for key patterns
 *
 * Supports `*`, `?`, character classes (`[abc]`, `[a-z]`, `[^a]`) and
 * backslash escapes. Unlike shell globs, `*` also matches `:` separators.
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

function escapeRegex(char: string): string {
  return char.replace(REGEX_SPECIAL, '\\$&');
}

export function globToRegExp(pattern: string): RegExp {
  let source = '';

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];

    if (char === '\\' && i + 1 < pattern.length) {
      i++;
      source += escapeRegex(pattern[i]);
    } else if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i + 1, close);
      let negate = false;
      if (body.startsWith('^')) {
        negate = true;
        body = body.slice(1);
      }
      const escapedBody = body.replace(/[\\\]]/g, '\\$&');
      source += `[${negate ? '^' : ''}${escapedBody}]`;
      i = close;
    } else {
      source += escapeRegex(char);
    }
  }

  return new RegExp(`^${source}$`, 's');
}

export function matchesGlob(pattern: string, key: string): boolean {
  return globToRegExp(pattern).test(key);
}
