const USE_COLOR = !process.env.NO_COLOR && process.stdout.isTTY === true;

const RESET = USE_COLOR ? "\x1b[0m" : "";
const GREEN = USE_COLOR ? "\x1b[32m" : "";
const RED = USE_COLOR ? "\x1b[31m" : "";
const YELLOW = USE_COLOR ? "\x1b[33m" : "";
const BLUE = USE_COLOR ? "\x1b[34m" : "";
const BOLD = USE_COLOR ? "\x1b[1m" : "";
const DIM = USE_COLOR ? "\x1b[2m" : "";

export const logger = {
  info(message: string): void {
    process.stdout.write(`${BLUE}${message}${RESET}\n`);
  },

  success(message: string): void {
    process.stdout.write(`${GREEN}${message}${RESET}\n`);
  },

  warn(message: string): void {
    process.stderr.write(`${YELLOW}warning: ${message}${RESET}\n`);
  },

  error(message: string): void {
    process.stderr.write(`${RED}error: ${message}${RESET}\n`);
  },

  debug(message: string): void {
    if (process.env.DEBUG) {
      process.stderr.write(`${DIM}${message}${RESET}\n`);
    }
  },

  section(title: string): void {
    process.stdout.write(`${BOLD}${title}${RESET}\n`);
  },

  log(message: string): void {
    process.stdout.write(`${message}\n`);
  },
};
