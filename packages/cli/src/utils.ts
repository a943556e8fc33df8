import chalk from 'chalk';
import { isBrokenPipe } from './errors.js';

/**
 * Exit with a validation error and an optional hint.
 */
export function exitWithValidationError(opts: { message: string; helpText?: string }): never {
  error(opts.message);
  if (opts.helpText != null && opts.helpText !== '') info(opts.helpText);
  process.exit(1);
}

/**
 * Read all of standard input as UTF-8, untouched.
 */
export async function readStdin(): Promise<string> {
  let content = '';
  process.stdin.setEncoding('utf-8');
  for await (const chunk of process.stdin) {
    content += String(chunk);
  }
  return content;
}

/**
 * Write to standard output, resolving once the data is handed off.
 */
export function writeStdout(content: string): Promise<void> {
  return new Promise((resolve, reject) => {
    process.stdout.write(content, (err) => {
      if (err != null) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.error(chalk.cyan('ℹ'), message);
}

/**
 * The message of `err` followed by the messages of its causes.
 */
export function describeError(err: unknown): string[] {
  const messages: string[] = [];
  let current: unknown = err;
  while (current != null) {
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      current = undefined;
    }
  }
  return messages.length > 0 ? messages : ['An unknown error occurred'];
}

/**
 * Handle errors consistently. A closed stdout pipe is a normal way for a
 * pipeline to end, so it exits quietly.
 */
export function handleError(err: unknown): never {
  if (isBrokenPipe(err)) {
    process.exit(0);
  }

  const [message = 'An unknown error occurred', ...causes] = describeError(err);
  error(message);
  for (const cause of causes) {
    console.error(`  ${chalk.gray('caused by:')} ${cause}`);
  }
  process.exit(1);
}
