// ANSI color codes for modern terminals
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
};

// Helper to style text
const style = {
  bold: (text: string) => `${colors.bold}${text}${colors.reset}`,
  dim: (text: string) => `${colors.dim}${text}${colors.reset}`,

  green: (text: string) => `${colors.green}${text}${colors.reset}`,
  red: (text: string) => `${colors.red}${text}${colors.reset}`,
  yellow: (text: string) => `${colors.yellow}${text}${colors.reset}`,
  blue: (text: string) => `${colors.blue}${text}${colors.reset}`,
  cyan: (text: string) => `${colors.cyan}${text}${colors.reset}`,

  successIcon: () => `${colors.green}✓${colors.reset}`,
  errorIcon: () => `${colors.red}✗${colors.reset}`,
  warnIcon: () => `${colors.yellow}⚠${colors.reset}`,
  stepIcon: () => `${colors.blue}→${colors.reset}`,
};

export const logger = {
  success(message: string): void {
    console.log(`${style.successIcon()} ${style.green(message)}`);
  },

  error(message: string): void {
    console.error(`${style.errorIcon()} ${style.red(message)}`);
  },

  warn(message: string): void {
    console.log(`${style.warnIcon()} ${style.yellow(message)}`);
  },

  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(`${style.stepIcon()} ${message}`);
  },

  section(message: string): void {
    console.log(`\n${style.bold(message)}`);
  },

  blank(): void {
    console.log();
  },

  style,

  box: {
    top: (width: number) => `╭${'─'.repeat(width - 2)}╮`,
    bottom: (width: number) => `╰${'─'.repeat(width - 2)}╯`,
    line: (width: number) => '─'.repeat(width),
  },
};
