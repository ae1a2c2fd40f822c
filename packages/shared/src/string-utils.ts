export const stripAnsi = (str: string): string => {
  // ANSI escape codes are sequences that start with `\x1b[` and end with a letter.
  return str.replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '');
};

/** Marker appended to output cut at the capture cap. */
export const TRUNCATION_MARKER = '\n[output truncated]';

/** Collapses a multi-line message into one line for tables and event payloads. */
export const firstLine = (str: string): string => {
  const line = str.split(/\r?\n/, 1)[0] ?? '';
  return line.trim();
};
