// ANSI-coloured console logging. QUIET=1 silences everything, LOG_STEPS=0 hides
// per-stage progress lines.

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
  magenta: (s: string) => `\x1b[35m${s}${COLOR.reset}`,
};

export interface CompileLogger {
  step(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface ConsoleLoggerOptions {
  quiet?: boolean;
  logSteps?: boolean;
}

export function consoleLogger(opts: ConsoleLoggerOptions = {}): CompileLogger {
  const quiet = opts.quiet ?? process.env.QUIET === "1";
  const logSteps = !quiet && (opts.logSteps ?? (process.env.LOG_STEPS ?? "1") !== "0");
  return {
    step(message) {
      if (logSteps) console.log(`${COLOR.cyan("▶")} ${message}`);
    },
    info(message) {
      if (logSteps) console.log(COLOR.gray(`  ${message}`));
    },
    warn(message) {
      if (!quiet) console.warn(COLOR.yellow(`  ⚠ ${message}`));
    }
  };
}

export const silentLogger: CompileLogger = {
  step() {},
  info() {},
  warn() {}
};
