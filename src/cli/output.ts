export interface CliIO {
  out(line?: string): void;
  err(line?: string): void;
}

export const consoleIO: CliIO = {
  out: (line = "") => console.log(line),
  err: (line = "") => console.error(line),
};

export type Colors = Record<"green" | "red" | "yellow" | "cyan" | "dim" | "bold", (s: string) => string>;

// ANSI colors (disabled if not TTY)
export function colors(enabled: boolean): Colors {
  const wrap = (code: string) => (s: string) => (enabled ? `\x1b[${code}m${s}\x1b[0m` : s);
  return {
    green: wrap("32"),
    red: wrap("31"),
    yellow: wrap("33"),
    cyan: wrap("36"),
    dim: wrap("2"),
    bold: wrap("1"),
  };
}

/**
 * Colors are on for a TTY unless NO_COLOR is set
 */
export function colorEnabled(env: NodeJS.ProcessEnv, isTTY: boolean | undefined): boolean {
  return Boolean(isTTY) && !env.NO_COLOR;
}
