import * as fs from 'node:fs/promises';
import { Option, type Command } from 'commander';
import {
  DEFAULT_BEGIN_MARKER,
  DEFAULT_END_MARKER,
  DEFAULT_TOC_FORMAT,
  TOC_FORMATS,
  check,
  createTocConfig,
  isBulletFormat,
  render,
  type TocFormat,
} from '@tocmark/core';
import { renderDiff } from '../check.js';
import { loadConfig, type TocmarkConfig } from '../config/index.js';
import { logger, setVerbosity } from '../logger.js';
import { exitWithValidationError, readStdin, writeStdout } from '../utils.js';
import { increaseVerbosity, parseNonEmptyOption, runCommandAction } from './_runtime/index.js';

export interface TocOptions {
  output?: string;
  inPlace?: boolean;
  check?: boolean;
  format?: string;
  bullet?: string;
  beginMarker?: string;
  endMarker?: string;
  verbose: number;
}

export interface TocSettings {
  format: TocFormat;
  beginMarker: string | undefined;
  endMarker: string | undefined;
}

const STDIN_NAME = '<stdin>';

export function registerTocCommand(program: Command): void {
  program
    .argument('[input]', 'Markdown file to read (default: standard input)')
    .addOption(
      new Option('-o, --output <file>', 'Write the result to a file instead of stdout').conflicts([
        'inPlace',
        'check',
      ])
    )
    .addOption(
      new Option('-i, --in-place', 'Rewrite the input file (stdout when reading stdin)').conflicts('check')
    )
    .option('-c, --check', 'Write nothing; print a diff and exit 1 if the table of contents is out of date')
    .addOption(
      new Option('-f, --format <format>', `List style (default: ${DEFAULT_TOC_FORMAT})`).choices(TOC_FORMATS)
    )
    .option('--bullet <symbol>', 'Custom list marker, overrides --format')
    .option('-b, --begin-marker <marker>', `Marker after which the table of contents goes (default: "${DEFAULT_BEGIN_MARKER}")`)
    .option('-e, --end-marker <marker>', `Marker that closes the table of contents (default: "${DEFAULT_END_MARKER}")`)
    .option('-v, --verbose', 'Log more to stderr; repeat for more detail', increaseVerbosity, 0)
    .addHelpText('after', getTocHelpText())
    .action(async (input: string | undefined, options: TocOptions) => {
      await runCommandAction(() => runToc(input, options));
    });
}

function getTocHelpText(): string {
  return `

By default the table of contents goes between two HTML comments:

    ${DEFAULT_BEGIN_MARKER}
    ...
    ${DEFAULT_END_MARKER}

Only the begin marker is needed the first time. Running tocmark again
refreshes the table of contents in place.

Examples:
  Add or update the table of contents of a file:
    $ tocmark -i README.md

  Use tocmark in a pipeline:
    $ cat README.md | tocmark | less

  Fail in CI when the table of contents is stale:
    $ tocmark --check README.md

  Number the entries and use custom markers:
    $ tocmark -f numbers -b "<!-- contents -->" -e "<!-- /contents -->" README.md
  `;
}

function resolveFormat(options: TocOptions, fileConfig: TocmarkConfig | undefined): TocFormat {
  const bullet = parseNonEmptyOption({ value: options.bullet, optionName: '--bullet' });
  if (bullet != null) {
    return { custom: bullet };
  }

  if (options.format != null) {
    if (!isBulletFormat(options.format)) {
      exitWithValidationError({
        message: `Unknown format "${options.format}"`,
        helpText: `Choose one of: ${TOC_FORMATS.join(', ')}`,
      });
    }
    return options.format;
  }

  if (fileConfig?.bullet != null) {
    return { custom: fileConfig.bullet };
  }
  return fileConfig?.format ?? DEFAULT_TOC_FORMAT;
}

/**
 * Merge command-line options over the config file. Options win.
 */
export function resolveSettings(options: TocOptions, fileConfig: TocmarkConfig | undefined): TocSettings {
  return {
    format: resolveFormat(options, fileConfig),
    beginMarker:
      parseNonEmptyOption({ value: options.beginMarker, optionName: '--begin-marker' }) ?? fileConfig?.beginMarker,
    endMarker: parseNonEmptyOption({ value: options.endMarker, optionName: '--end-marker' }) ?? fileConfig?.endMarker,
  };
}

async function readInput(input: string | undefined): Promise<string> {
  if (input == null) {
    logger.debug('reading from stdin');
    return readStdin();
  }
  logger.debug(`reading file; file=${input}`);
  return fs.readFile(input, 'utf-8');
}

async function runToc(input: string | undefined, options: TocOptions): Promise<void> {
  setVerbosity(options.verbose);
  logger.debug(`parsed cli arguments; input=${input ?? STDIN_NAME} options=${JSON.stringify(options)}`);

  const loaded = loadConfig();
  if (loaded != null) {
    logger.info(`using config file; file=${loaded.path}`);
  }

  const settings = resolveSettings(options, loaded?.config);
  logger.trace(`resolved settings; settings=${JSON.stringify(settings)}`);
  const config = createTocConfig(settings);

  const source = await readInput(input);
  const sourceName = input ?? STDIN_NAME;

  if (options.check === true) {
    const result = check(config, source);
    if (result.changed) {
      process.stderr.write(renderDiff(source, result.output, sourceName));
      process.exitCode = 1;
    } else {
      logger.info(`table of contents is up to date; source=${sourceName}`);
    }
    return;
  }

  const output = render(config, source);
  const target = options.output ?? (options.inPlace === true ? input : undefined);

  if (target != null) {
    logger.info(`writing to file; file=${target}`);
    await fs.writeFile(target, output, 'utf-8');
  } else {
    logger.info('writing to stdout');
    await writeStdout(output);
  }
}
