export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export function stderrLogger(): Logger {
  const write = (...args: unknown[]) => console.error(...args);
  return {
    debug: write,
    info: write,
    warn: write,
    error: write,
  };
}
