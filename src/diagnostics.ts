/** Where the library reports its own failures; never the log stream itself. */
export type DiagnosticsLogger = Pick<typeof console, "error">;

export function formatErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
