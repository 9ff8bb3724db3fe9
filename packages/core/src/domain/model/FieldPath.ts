/** One step of a field path: a mapping key or a sequence index. */
export type PathSegment = { readonly kind: 'key'; readonly key: string } | { readonly kind: 'index'; readonly index: number };

const KEY_SEPARATOR = '.';
const INDEX_SEPARATOR = ':';

export function keySegment(key: string): PathSegment {
  return { kind: 'key', key };
}

export function indexSegment(index: number): PathSegment {
  return { kind: 'index', index };
}

/** Whether `name` can be used as a mapping key (non-empty, no `.` or `:`, not `__proto__`). */
export function isValidKey(name: string): boolean {
  return name !== '' && name !== '__proto__' && !name.includes(KEY_SEPARATOR) && !name.includes(INDEX_SEPARATOR);
}

/** Full name of a child given its parent's full name. The root's full name is `''`. */
export function childPath(parentFullName: string, segment: PathSegment): string {
  if (segment.kind === 'index') return `${parentFullName}${INDEX_SEPARATOR}${String(segment.index)}`;
  return parentFullName === '' ? segment.key : `${parentFullName}${KEY_SEPARATOR}${segment.key}`;
}

export function formatPath(segments: readonly PathSegment[]): string {
  return segments.reduce((path, segment) => childPath(path, segment), '');
}

/**
 * Parse a flat field name such as `address.street` or `tags:0.name`.
 *
 * Grammar: `path := [key] ('.' key | ':' index)*`. Returns `null` for
 * malformed names (empty keys, non-numeric indexes, a leading `.`).
 */
export function parsePath(path: string): PathSegment[] | null {
  return new PathParser(path).parse();
}

class PathParser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parse(): PathSegment[] | null {
    const segments: PathSegment[] = [];
    if (this.input === '') return segments;
    // A leading '.' is never produced by childPath.
    if (this.input.startsWith(KEY_SEPARATOR)) return null;

    if (!this.atSeparator()) {
      const key = this.readKey();
      if (key === null) return null;
      segments.push(keySegment(key));
    }

    while (this.pos < this.input.length) {
      const separator = this.input[this.pos];
      this.pos++;
      const segment = separator === INDEX_SEPARATOR ? this.readIndex() : this.readKeySegment();
      if (segment === null) return null;
      segments.push(segment);
    }

    return segments;
  }

  private atSeparator(): boolean {
    const char = this.input[this.pos];
    return char === KEY_SEPARATOR || char === INDEX_SEPARATOR;
  }

  private readKeySegment(): PathSegment | null {
    const key = this.readKey();
    return key === null ? null : keySegment(key);
  }

  private readKey(): string | null {
    const start = this.pos;
    while (this.pos < this.input.length && !this.atSeparator()) this.pos++;
    return this.pos === start ? null : this.input.slice(start, this.pos);
  }

  private readIndex(): PathSegment | null {
    const start = this.pos;
    while (this.pos < this.input.length && isDigit(this.input[this.pos])) this.pos++;
    if (this.pos === start || (this.pos < this.input.length && !this.atSeparator())) return null;
    const index = Number(this.input.slice(start, this.pos));
    return Number.isSafeInteger(index) ? indexSegment(index) : null;
  }
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}
