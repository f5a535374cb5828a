const TIMESTAMP_MARKER = '-->';

/**
 * Plain text of an SRT subtitle file: cue numbers, timing lines and blank
 * separators are removed, remaining lines joined with single spaces.
 */
export function srtToText(content: string): string {
  const textLines: string[] = [];

  for (const rawLine of content.replace(/^\uFEFF/, '').split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    if (/^\d+$/.test(line)) continue;
    if (line.includes(TIMESTAMP_MARKER)) continue;
    textLines.push(line);
  }

  return textLines.join(' ');
}
