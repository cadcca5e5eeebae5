/**
 * Terminal text helpers: ANSI-aware measuring, padding and word wrapping.
 *
 * Wrapping works on plain text (or on styled segments whose style is applied
 * after wrapping) so that escape codes never get split across lines.
 */

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_PATTERN, '');
}

/** Number of visible characters (code points) once escape codes are removed. */
export function visibleLength(str: string): number {
  return Array.from(stripAnsi(str)).length;
}

export function padVisible(str: string, width: number): string {
  const missing = width - visibleLength(str);
  return missing > 0 ? str + ' '.repeat(missing) : str;
}

export function centerVisible(str: string, width: number): string {
  const missing = width - visibleLength(str);
  if (missing <= 0) return str;
  const left = Math.floor(missing / 2);
  return ' '.repeat(left) + str + ' '.repeat(missing - left);
}

/**
 * Word-wrap plain text to `width` columns. Embedded newlines are kept,
 * the first line of each paragraph keeps its indentation and words longer
 * than a line are folded.
 */
export function wrapText(text: string, width: number): string[] {
  const limit = Math.max(1, width);
  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    lines.push(...wrapLine(paragraph, limit));
  }
  return lines;
}

function wrapLine(line: string, width: number): string[] {
  if (Array.from(line).length <= width) return [line];

  const indentMatch = /^\s*/.exec(line);
  let indent = indentMatch ? indentMatch[0] : '';
  if (indent.length >= width) indent = '';

  const words = line.trim().split(/\s+/).filter((w) => w.length > 0);
  const lines: string[] = [];
  let current = indent;
  let hasWord = false;

  for (const word of words) {
    const candidate = hasWord ? `${current} ${word}` : current + word;
    if (Array.from(candidate).length <= width) {
      current = candidate;
      hasWord = true;
      continue;
    }

    if (hasWord) {
      lines.push(current);
      current = '';
    }

    let rest = Array.from(word);
    while (Array.from(current).length + rest.length > width) {
      const take = width - Array.from(current).length;
      lines.push(current + rest.slice(0, take).join(''));
      rest = rest.slice(take);
      current = '';
    }
    current += rest.join('');
    hasWord = true;
  }

  if (hasWord || lines.length === 0) lines.push(current);
  return lines;
}

// ---------------------------------------------------------------------------
// Styled segments
// ---------------------------------------------------------------------------

export type Style = (text: string) => string;

export interface Segment {
  text: string;
  style?: Style;
}

export type StyledLine = Segment[];

/** Split segments on embedded newlines into separate lines. */
export function splitSegmentLines(segments: Segment[]): StyledLine[] {
  const lines: StyledLine[] = [[]];
  for (const segment of segments) {
    const parts = segment.text.split('\n');
    parts.forEach((part, index) => {
      if (index > 0) lines.push([]);
      if (part.length > 0) {
        lines[lines.length - 1].push({ text: part, style: segment.style });
      }
    });
  }
  return lines;
}

/**
 * Wrap one styled line to `width` columns. Whitespace at the start of a
 * continuation line is dropped, over-long tokens are folded.
 */
export function wrapSegments(line: StyledLine, width: number): StyledLine[] {
  const limit = Math.max(1, width);
  const tokens: Segment[] = [];
  for (const segment of line) {
    for (const text of segment.text.split(/(\s+)/)) {
      if (text.length > 0) tokens.push({ text, style: segment.style });
    }
  }

  const lines: StyledLine[] = [];
  let current: StyledLine = [];
  let used = 0;

  const flush = (): void => {
    lines.push(current);
    current = [];
    used = 0;
  };

  for (const token of tokens) {
    const isSpace = /^\s+$/.test(token.text);
    let chars = Array.from(token.text);

    if (isSpace) {
      if (lines.length > 0 && used === 0) continue;
      if (used + chars.length > limit) {
        flush();
        continue;
      }
      current.push(token);
      used += chars.length;
      continue;
    }

    if (used + chars.length > limit && used > 0 && chars.length <= limit) {
      trimTrailingSpace(current);
      flush();
    }
    while (used + chars.length > limit) {
      const take = limit - used;
      current.push({ text: chars.slice(0, take).join(''), style: token.style });
      chars = chars.slice(take);
      flush();
    }
    if (chars.length > 0) {
      current.push({ text: chars.join(''), style: token.style });
      used += chars.length;
    }
  }

  if (current.length > 0 || lines.length === 0) lines.push(current);
  return lines;
}

function trimTrailingSpace(line: StyledLine): void {
  while (line.length > 0 && /^\s+$/.test(line[line.length - 1].text)) {
    line.pop();
  }
}

export function segmentsLength(line: StyledLine): number {
  return line.reduce((sum, segment) => sum + Array.from(segment.text).length, 0);
}

export function renderSegments(line: StyledLine): string {
  return line.map((segment) => (segment.style ? segment.style(segment.text) : segment.text)).join('');
}
