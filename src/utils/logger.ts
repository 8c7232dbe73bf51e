import chalk from "chalk";

let enabled = false;

export function setLoggingEnabled(value: boolean): void {
  enabled = value;
}

function getPreMessage(): string {
  const now = new Date();
  return chalk.gray(`[dnspeed] ${now.toISOString().slice(11, 19)}.${String(now.getMilliseconds()).padStart(3, "0")}`);
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (enabled) {
      console.error(getPreMessage(), chalk.dim(message), ...args);
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (enabled) {
      console.error(getPreMessage(), message, ...args);
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (enabled) {
      console.error(getPreMessage(), chalk.yellow(message), ...args);
    }
  },

  error(message: string, ...args: unknown[]): void {
    if (enabled) {
      console.error(getPreMessage(), chalk.red(message), ...args);
    }
  },
};
