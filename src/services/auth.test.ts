import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CredentialStore, askForToken } from './auth';
import { ConfigError } from '../lib/errors';
import { makeTempDir, scriptedPrompter } from '../testing/fakes';

describe('CredentialStore', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    configPath = path.join(dir, 'nested', 'album-uploader', 'config.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return null when nothing has been saved', async () => {
    const store = new CredentialStore(configPath);

    await expect(store.read()).resolves.toBeNull();
  });

  it('should save the token as JSON readable by the owner only', async () => {
    const store = new CredentialStore(configPath);

    await store.save('  test-token  ');

    expect(await fs.readFile(configPath, 'utf8')).toBe('{"imgurAccessToken":"test-token"}');
    const stats = await fs.stat(configPath);
    expect(stats.mode & 0o777).toBe(0o600);
    await expect(store.read()).resolves.toBe('test-token');
  });

  it('should treat an empty stored token as missing', async () => {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, '{"imgurAccessToken":""}');

    await expect(new CredentialStore(configPath).read()).resolves.toBeNull();
  });

  it('should fail with ConfigError on malformed JSON', async () => {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, '{not json');

    await expect(new CredentialStore(configPath).read()).rejects.toBeInstanceOf(ConfigError);
  });

  it('should refuse to save an empty token', async () => {
    await expect(new CredentialStore(configPath).save('   ')).rejects.toThrow('Access token must not be empty');
  });

  it('should fail with ConfigError when the location is not writable', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    const store = new CredentialStore(path.join(blocker, 'config.json'));

    await expect(store.save('test-token')).rejects.toBeInstanceOf(ConfigError);
  });

  describe('resolve', () => {
    it('should use the stored token without prompting', async () => {
      const store = new CredentialStore(configPath);
      await store.save('stored-token');
      const prompter = scriptedPrompter([]);

      await expect(store.resolve({ prompter })).resolves.toBe('stored-token');
      expect(prompter.questions).toEqual([]);
    });

    it('should prompt when no token is stored and save the answer', async () => {
      const store = new CredentialStore(configPath);
      const prompter = scriptedPrompter(['', '  pasted-token ']);
      const print = vi.fn();

      await expect(store.resolve({ prompter, print })).resolves.toBe('pasted-token');

      expect(prompter.questions).toEqual(['Paste your Imgur access token > ', 'Paste your Imgur access token > ']);
      expect(print).toHaveBeenCalledWith(`No Imgur access token found in ${configPath}.`);
      expect(print).toHaveBeenCalledWith('The access token must not be empty. Please try again.');
      await expect(store.read()).resolves.toBe('pasted-token');
    });

    it('should not prompt again once a pasted token was saved', async () => {
      const store = new CredentialStore(configPath);
      await store.resolve({ prompter: scriptedPrompter(['pasted-token']), print: vi.fn() });

      const secondRun = scriptedPrompter([]);
      await expect(new CredentialStore(configPath).resolve({ prompter: secondRun })).resolves.toBe('pasted-token');
      expect(secondRun.questions).toEqual([]);
    });

    it('should save and use an override in place of the stored token', async () => {
      const store = new CredentialStore(configPath);
      await store.save('old-token');
      const prompter = scriptedPrompter([]);

      await expect(store.resolve({ override: 'new-token', prompter })).resolves.toBe('new-token');
      await expect(store.read()).resolves.toBe('new-token');
      expect(prompter.questions).toEqual([]);
    });
  });
});

describe('askForToken', () => {
  it('should fail with ConfigError when input ends', async () => {
    await expect(askForToken(scriptedPrompter([null]), vi.fn())).rejects.toThrow('No access token was provided');
  });
});
