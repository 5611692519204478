/**
 * Command-line front end
 *
 * Usage:
 *   npm run upload -- <directory> <album-title> [--access-token=<token>] [--public]
 *   npm run upload -- [--help | --version | --show-config-path]
 */
import * as fs from 'fs';
import { parseArgs } from 'util';
import { loadConfig, type AppConfig } from './config';
import { AppError, EXIT_CODES, UsageError, type ExitCode } from './lib/errors';
import { createLogger, type Logger } from './lib/logger';
import { confirm, createTerminalPrompter, presentPlan, type Print, type Prompter } from './helpers/prompt';
import { createConsoleReporter } from './helpers/progress';
import { CredentialStore } from './services/auth';
import { createStorageProvider } from './services/storage/ProviderFactory';
import type { StorageProvider } from './services/storage/StorageProvider';
import { UploadService } from './services/upload';

export const USAGE = `Upload a directory of images to Imgur as one album, in file name order.

Usage:
  npm run upload -- <directory> <album-title> [options]
  npm run upload -- --show-config-path | --help | --version

Arguments:
  <directory>                 Directory containing the images
  <album-title>               Title of the album to create

Options:
  -a, --access-token=<token>  Imgur access token to use (saved for later runs)
  -p, --public                Make the album public (albums are hidden by default)
      --sort=<order>          File order: lexical (default) or natural
      --verbose               Print debug logs
  -c, --show-config-path      Print the path of the configuration file
  -h, --help                  Show this screen
  -v, --version               Show version`;

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  print?: Print;
  printError?: Print;
  prompter?: Prompter;
  /** Progress output; defaults to stderr, redrawn in place on a terminal */
  progress?: NodeJS.WritableStream;
  createProvider?: (accessToken: string, config: AppConfig, logger: Logger) => StorageProvider;
}

export function readVersion(): string {
  const packageJson: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'access-token': { type: 'string', short: 'a' },
        public: { type: 'boolean', short: 'p' },
        sort: { type: 'string' },
        verbose: { type: 'boolean' },
        'show-config-path': { type: 'boolean', short: 'c' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'v' },
      },
    });
  } catch (error: unknown) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

function defaultProvider(accessToken: string, config: AppConfig, logger: Logger): StorageProvider {
  return createStorageProvider('imgur', {
    accessToken,
    baseURL: config.apiBaseUrl,
    logger: logger.child('Imgur'),
  });
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: string[], deps: CliDependencies = {}): Promise<ExitCode> {
  const {
    env = process.env,
    print = console.log,
    printError = console.error,
    createProvider = defaultProvider,
  } = deps;

  let logger = createLogger('album-upload');
  let prompter: Prompter | undefined;

  try {
    const { values, positionals } = parseCommandLine(argv);

    if (values.help) {
      print(USAGE);
      return EXIT_CODES.SUCCESS;
    }

    if (values.version) {
      print(`album-upload ${readVersion()}`);
      return EXIT_CODES.SUCCESS;
    }

    const config = loadConfig(env, {
      sortOrder: values.sort,
      public: values.public,
      verbose: values.verbose,
    });
    logger = createLogger('album-upload', config.logLevel);

    if (values['show-config-path']) {
      print(config.configPath);
      return EXIT_CODES.SUCCESS;
    }

    if (positionals.length !== 2) {
      throw new UsageError('Expected exactly two arguments: <directory> <album-title>');
    }
    const [directory, title] = positionals;

    prompter = deps.prompter ?? createTerminalPrompter();
    const activePrompter = prompter;

    const service = new UploadService(async () => {
      const store = new CredentialStore(config.configPath, logger.child('Credentials'));
      const accessToken = await store.resolve({
        override: values['access-token'],
        prompter: activePrompter,
        print,
      });
      return createProvider(accessToken, config, logger);
    }, {
      confirm: async (files) => {
        presentPlan(files, print);
        return confirm(activePrompter, 'Do you want to continue?', false, print);
      },
      observer: createConsoleReporter({
        print,
        progress: deps.progress,
        interactive: deps.progress ? false : undefined,
      }),
      sortOrder: config.sortOrder,
      privacy: config.privacy,
      logger: logger.child('Upload'),
    });

    await service.run({ directory, title });
    return EXIT_CODES.SUCCESS;
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      printError(`❌ Error: ${error.message}\n`);
      printError(USAGE);
      return error.exitCode;
    }

    if (AppError.isAppError(error)) {
      logger.debug('Run ended with an error', { name: error.name, ...error.details });
      printError(`❌ Error: ${error.message}`);
      return error.exitCode;
    }

    logger.error('Unexpected failure', error);
    printError(`❌ Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_CODES.UNEXPECTED;
  } finally {
    prompter?.close();
  }
}
