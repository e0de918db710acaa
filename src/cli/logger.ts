import chalk from 'chalk';

type Tone = 'success' | 'info' | 'warn' | 'error' | 'muted';

const marks: Record<Tone, string> = {
  success: chalk.green('✔'),
  info: chalk.cyan('ℹ'),
  warn: chalk.yellow('⚠'),
  error: chalk.red('✖'),
  muted: chalk.gray('·'),
};

const paint: Record<Tone, (text: string) => string> = {
  success: chalk.green,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  muted: chalk.gray,
};

function say(tone: Tone, msg: string): void {
  console.log(`${marks[tone]} ${paint[tone](msg)}`);
}

export function heading(title: string): void {
  console.log(`\n${chalk.bold.blue(title)}`);
}

/** `label: value` row, labels padded so values line up under a heading */
export function kv(label: string, value: string): void {
  console.log(`  ${chalk.gray(`${label}:`.padEnd(13))}${value}`);
}

export const render = {
  blank(): void {
    console.log();
  },
  success(msg: string): void {
    say('success', msg);
  },
  info(msg: string): void {
    say('info', msg);
  },
  /** Per-connection traffic lines while serving */
  muted(msg: string): void {
    say('muted', msg);
  },
  warn(msg: string): void {
    say('warn', msg);
  },
  error(msg: string): void {
    say('error', msg);
  },
  bullets(values: readonly string[]): void {
    for (const value of values) {
      console.log(`  - ${value}`);
    }
  },
};
