type ConsoleWarn = (...args: unknown[]) => void;

/**
 * Run `fn` with console.warn replaced by a recorder and return every line
 * it received. The previous console.warn is restored even when `fn` throws.
 */
export function captureConsoleWarn(fn: () => void): string[] {
  const lines: string[] = [];
  const previous: ConsoleWarn = console.warn;
  console.warn = (...args: unknown[]) => {
    lines.push(args.map((a) => String(a)).join(" "));
  };
  try {
    fn();
  } finally {
    console.warn = previous;
  }
  return lines;
}
