/**
 * Line buffering for streamed text: only complete lines are written.
 */

/**
 * Append `newContent` to `buffer`, write every complete line (right-trimmed,
 * blank lines skipped) and return the unterminated remainder.
 */
export function processLineBuffer(
  buffer: string,
  newContent: string,
  write: (line: string) => void,
): string {
  let rest = buffer + newContent;
  let newline = rest.indexOf('\n');

  while (newline >= 0) {
    const line = rest.slice(0, newline).trimEnd();
    rest = rest.slice(newline + 1);
    if (line) {
      write(line);
    }
    newline = rest.indexOf('\n');
  }

  return rest;
}
