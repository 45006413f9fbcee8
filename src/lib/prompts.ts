import * as p from "@clack/prompts";

/**
 * Returns true if the CLI is running in an interactive terminal.
 * False when stdin is piped or `CI` is set.
 */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY) && !process.env["CI"];
}

/**
 * Asks a yes/no question. Non-interactive runs take `fallback`; Ctrl+C
 * cancels the whole command.
 */
export async function confirm(message: string, fallback = true): Promise<boolean> {
  if (!isInteractive()) return fallback;
  const value = await p.confirm({ message, initialValue: fallback });
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  return value;
}

/**
 * Wraps an async operation with a clack spinner.
 * Only shows spinner when interactive.
 */
export async function withSpinner<T>(
  message: string,
  fn: () => Promise<T>,
  successMessage?: string,
): Promise<T> {
  if (!isInteractive()) {
    return fn();
  }

  const s = p.spinner();
  s.start(message);
  try {
    const result = await fn();
    s.stop(successMessage ?? message);
    return result;
  } catch (err) {
    s.stop(`Failed: ${message}`);
    throw err;
  }
}
