/**
 * Bounded renderers for raw external text embedded in failure messages.
 * Both helpers are total: any string and any length bound yield a string.
 */

export const DEFAULT_SNIPPET_LENGTH = 200;

export const TRUNCATION_MARKER = "... (truncated)";

const LEADING_ELLIPSIS = "...";

const toBound = (maxLength: number): number =>
  Number.isFinite(maxLength) && maxLength > 0 ? Math.floor(maxLength) : 0;

const isHighSurrogate = (code: number): boolean =>
  code >= 0xd800 && code <= 0xdbff;

const isLowSurrogate = (code: number): boolean =>
  code >= 0xdc00 && code <= 0xdfff;

const splitsPair = (text: string, index: number): boolean =>
  index > 0 &&
  index < text.length &&
  isHighSurrogate(text.charCodeAt(index - 1)) &&
  isLowSurrogate(text.charCodeAt(index));

// Cut points never fall inside a surrogate pair.
const safeEnd = (text: string, index: number): number =>
  splitsPair(text, index) ? index - 1 : index;

const safeStart = (text: string, index: number): number =>
  splitsPair(text, index) ? index + 1 : index;

/**
 * Returns the text untouched when it fits, otherwise its first `maxLength` characters plus a visible marker.
 */
export const truncateForDisplay = (text: string, maxLength: number): string => {
  const bound = toBound(maxLength);
  if (text.length <= bound) {
    return text;
  }

  return `${text.slice(0, safeEnd(text, bound))}${TRUNCATION_MARKER}`;
};

const collapseLines = (text: string): string =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join(" ");

const offsetFromLineColumn = (
  text: string,
  line: number,
  column: number,
): number => {
  const lines = text.split("\n");
  let offset = 0;
  for (let index = 0; index < line - 1 && index < lines.length; index += 1) {
    offset += (lines[index] ?? "").length + 1;
  }

  return offset + Math.max(0, column - 1);
};

/**
 * Finds where brackets stop balancing, ignoring anything inside string literals.
 * Input that ends with open brackets or an open string points at its end.
 */
const unbalancedOffset = (text: string): number | null => {
  const expectedClosers: string[] = [];
  let inString = false;
  let escaped = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text.charAt(index);

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      expectedClosers.push("}");
    } else if (char === "[") {
      expectedClosers.push("]");
    } else if (char === "}" || char === "]") {
      if (expectedClosers.pop() !== char) {
        return index;
      }
    }
  }

  return expectedClosers.length > 0 || inString ? text.length : null;
};

const locateErrorOffset = (text: string, reason?: string): number | null => {
  const position = reason?.match(/\bposition (\d+)/i);
  if (position?.[1]) {
    const offset = Number.parseInt(position[1], 10);
    if (offset <= text.length) {
      return offset;
    }
  }

  const lineColumn = reason?.match(/\bline (\d+),? column (\d+)/i);
  if (lineColumn?.[1] && lineColumn[2]) {
    const offset = offsetFromLineColumn(
      text,
      Number.parseInt(lineColumn[1], 10),
      Number.parseInt(lineColumn[2], 10),
    );
    if (offset <= text.length) {
      return offset;
    }
  }

  return unbalancedOffset(text);
};

/**
 * Extracts the region of raw JSON most likely to explain a parse failure.
 * The window centres on a position hint from `reason`, or on the first bracket imbalance;
 * without either it degrades to prefix truncation. Line breaks collapse to single spaces.
 */
export const jsonErrorSnippet = (
  text: string,
  maxLength: number,
  reason?: string,
): string => {
  const bound = toBound(maxLength);
  const collapsed = collapseLines(text);
  if (collapsed.length <= bound) {
    return collapsed;
  }

  const offset = locateErrorOffset(text, reason);
  const room = bound - LEADING_ELLIPSIS.length;
  if (offset === null || offset < bound || room <= 0) {
    return truncateForDisplay(collapsed, bound);
  }

  const windowStart = Math.min(
    offset - Math.floor(room / 2),
    text.length - room,
  );
  const start = safeStart(text, windowStart);
  const end = safeEnd(text, windowStart + room);
  const tail = end < text.length ? TRUNCATION_MARKER : "";

  return `${LEADING_ELLIPSIS}${collapseLines(text.slice(start, end))}${tail}`;
};
