export interface TerminalStream {
  isTTY?: boolean;
  columns?: number;
}

/** Column count of `stream`, or 0 when it is not a terminal. */
export function currentTerminalWidth(stream: TerminalStream = process.stdout): number {
  if (!stream.isTTY) return 0;
  return stream.columns ?? 0;
}
