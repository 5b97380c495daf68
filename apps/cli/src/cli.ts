import type { LoggerMethods, LogLevel } from '@outline-tree/logger';
import type { OutputFormat } from '@outline-tree/model';

import { createConsoleLogger, parseLogLevel } from '@outline-tree/logger';
import { renderOutline } from '@outline-tree/outline-renderer';
import {
  OutlineReadError,
  PdfOutlineExtractor,
  UnexpectedOutlineError,
} from '@outline-tree/pdf-outline';
import { basename } from 'node:path';
import { parseArgs } from 'node:util';

import { CLI_ARG_OPTIONS, cliOptionsSchema } from './cli-options';
import { HELP_HINT, HELP_TEXT, USAGE } from './help';

export const LOG_LEVEL_ENV = 'OUTLINE_TREE_LOG_LEVEL';

const parseArguments = (argv: readonly string[]) =>
  parseArgs({
    args: [...argv],
    options: CLI_ARG_OPTIONS,
    allowPositionals: true,
    strict: true,
  });

type ParsedArguments = ReturnType<typeof parseArguments>;

export interface CliIo {
  /**
   * Receives the rendering and the help text
   */
  stdout: (text: string) => void;

  /**
   * Receives error messages
   */
  stderr: (text: string) => void;

  env: Record<string, string | undefined>;

  /**
   * Logger factory, console logger by default
   */
  createLogger?: (level: LogLevel) => LoggerMethods;
}

/**
 * OutlineCli
 *
 * Command-line front end: parses arguments, extracts the outline of one PDF
 * and prints it. `run` resolves to the process exit code and never throws.
 */
export class OutlineCli {
  private readonly createLogger: (level: LogLevel) => LoggerMethods;

  constructor(private readonly io: CliIo) {
    this.createLogger =
      io.createLogger ?? ((level) => createConsoleLogger({ level }));
  }

  async run(argv: readonly string[]): Promise<number> {
    let parsed: ParsedArguments;
    try {
      parsed = parseArguments(argv);
    } catch (error) {
      this.io.stderr(`Error: ${OutlineReadError.getErrorMessage(error)}`);
      this.io.stderr('');
      this.io.stderr(HELP_TEXT);
      return 1;
    }

    const result = cliOptionsSchema.safeParse(parsed.values);
    if (!result.success) {
      this.io.stderr(`Error: ${result.error.issues[0].message}`);
      return 1;
    }
    const options = result.data;

    if (options.help) {
      this.io.stdout(HELP_TEXT);
      return 0;
    }

    const [path] = parsed.positionals;
    if (path === undefined) {
      this.io.stderr('Error: No PDF file specified');
      this.io.stderr('');
      this.io.stderr(USAGE);
      this.io.stderr(HELP_HINT);
      return 1;
    }

    const logger = this.createLogger(
      options.verbose ? 'debug' : parseLogLevel(this.io.env[LOG_LEVEL_ENV]),
    );
    const format: OutputFormat = options.tree ? 'tree' : 'markdown';

    try {
      const extractor = new PdfOutlineExtractor({ logger });
      const extraction = await extractor.extractFromFile(path);

      this.io.stdout(
        renderOutline(extraction, format, {
          fileName: basename(path),
          maxDepth: options.depth,
          indent: options.indent,
        }),
      );
      return 0;
    } catch (error) {
      const readError =
        error instanceof OutlineReadError
          ? error
          : UnexpectedOutlineError.fromError(error);
      logger.debug('[OutlineCli] Failed:', readError.cause ?? readError);
      this.io.stderr(`Error: ${readError.message}`);
      return 1;
    }
  }
}
