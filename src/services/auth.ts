import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigError, isErrnoException } from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';
import type { Prompter, Print } from '../helpers/prompt';

/**
 * Shape of the per-user config file
 */
export interface StoredConfig {
  imgurAccessToken: string;
}

export interface ResolveTokenOptions {
  /** Token given on the command line; replaces the stored one */
  override?: string;
  prompter: Prompter;
  print?: Print;
}

function parseStoredConfig(raw: string): StoredConfig {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== 'object' || data === null) {
    throw new Error('Configuration is not a JSON object');
  }

  const token = 'imgurAccessToken' in data ? data.imgurAccessToken : '';
  return { imgurAccessToken: typeof token === 'string' ? token : '' };
}

/**
 * Keeps the Imgur access token in the per-user config file.
 * The token is never logged; only whether one is present.
 */
export class CredentialStore {
  private readonly configPath: string;
  private readonly logger: Logger;

  constructor(configPath: string, logger: Logger = rootLogger.child('Credentials')) {
    this.configPath = configPath;
    this.logger = logger;
  }

  /**
   * Read the stored token
   * @returns The token, or null when none has been saved yet
   * @throws ConfigError when the file exists but cannot be read or parsed
   */
  async read(): Promise<string | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.configPath, 'utf8');
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.debug('No configuration file yet', { configPath: this.configPath });
        return null;
      }
      throw new ConfigError({
        message: `Could not read configuration file: ${this.configPath}`,
        cause: error,
        details: { configPath: this.configPath },
      });
    }

    let config: StoredConfig;
    try {
      config = parseStoredConfig(raw);
    } catch (error: unknown) {
      throw new ConfigError({
        message: `Configuration file is not valid JSON: ${this.configPath}`,
        cause: error,
        details: { configPath: this.configPath },
      });
    }

    const token = config.imgurAccessToken.trim();
    this.logger.debug('Loaded configuration', { configPath: this.configPath, hasToken: token.length > 0 });
    return token || null;
  }

  /**
   * Persist a token, readable by the current user only
   * @throws ConfigError when the token is empty or the file cannot be written
   */
  async save(token: string): Promise<void> {
    const trimmed = token.trim();
    if (!trimmed) {
      throw new ConfigError({ message: 'Access token must not be empty' });
    }

    const config: StoredConfig = { imgurAccessToken: trimmed };
    try {
      await fs.mkdir(path.dirname(this.configPath), { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(config), { encoding: 'utf8', mode: 0o600 });
      await fs.chmod(this.configPath, 0o600);
    } catch (error: unknown) {
      throw new ConfigError({
        message: `Could not write configuration file: ${this.configPath}`,
        cause: error,
        details: { configPath: this.configPath },
      });
    }

    this.logger.debug('Saved access token', { configPath: this.configPath });
  }

  /**
   * Return the token to authenticate with: the override (saved for later
   * runs), else the stored token, else one pasted by the user (also saved).
   */
  async resolve(options: ResolveTokenOptions): Promise<string> {
    const { override, prompter, print = console.log } = options;

    if (override !== undefined) {
      await this.save(override);
      return override.trim();
    }

    const stored = await this.read();
    if (stored) return stored;

    print(`No Imgur access token found in ${this.configPath}.`);
    const token = await askForToken(prompter, print);
    await this.save(token);
    return token;
  }
}

/**
 * Prompt until a non-empty token is entered
 * @throws ConfigError when input ends first
 */
export async function askForToken(prompter: Prompter, print: Print = console.log): Promise<string> {
  for (;;) {
    const answer = await prompter.ask('Paste your Imgur access token > ');
    if (answer === null) {
      throw new ConfigError({ message: 'No access token was provided' });
    }

    const token = answer.trim();
    if (token) return token;

    print('The access token must not be empty. Please try again.');
  }
}
