const COMMA_BEFORE_CLOSING_BRACE = /,(\s*)\}(\s*)$/;

/** The outermost `{ … }` region of a reply, or the reply itself when it has none. */
export function extractJsonObject(text: string): string {
  const match = text.match(/\{[\s\S]*\}/);
  return match ? match[0] : text;
}

/**
 * Strip trailing commas that sit before a closing brace: either at the end of a
 * line followed by a line that is just `}`, or directly before a `}` that ends
 * the line. Nothing else is relaxed.
 */
export function repairJson(text: string): string {
  const lines = text.split('\n');
  return lines
    .map((line, index) => {
      const next = lines[index + 1];
      const trimmed = line.trimEnd();
      if (trimmed.endsWith(',') && next !== undefined && next.trim() === '}') {
        return trimmed.slice(0, -1);
      }
      return line.replace(COMMA_BEFORE_CLOSING_BRACE, '$1}$2');
    })
    .join('\n');
}
