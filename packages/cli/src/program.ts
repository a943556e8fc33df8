import { Command } from 'commander';
import { registerTocCommand } from './commands/toc.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('tocmark')
    .description('Generate and update the table of contents of a Markdown document')
    .version(VERSION, '-V, --version');

  registerTocCommand(program);
  return program;
}
