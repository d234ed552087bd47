import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, type CliOptions } from '../src/config.js';
import { DEFAULT_SYSTEM_PROMPT } from '../src/engines/prompt.js';
import { ConfigError } from '../src/errors.js';

describe('loadConfig', () => {
  let cwd: string;
  let home: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'draftcommit-project-'));
    home = mkdtempSync(join(tmpdir(), 'draftcommit-home-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
    rmSync(home, { recursive: true, force: true });
  });

  const load = (cli: CliOptions = {}, env: NodeJS.ProcessEnv = {}) => loadConfig(cli, { cwd, home, env });

  const configError = (cli: CliOptions = {}) =>
    load(cli).then(
      () => undefined,
      (error: unknown) => (error instanceof ConfigError ? error : undefined)
    );

  it('should fall back to defaults', async () => {
    const config = await load();

    expect(config).toMatchObject({
      model: 'gpt-5.1',
      apiEndpoint: 'https://api.openai.com/v1/chat/completions',
      apiKey: '',
      choices: 3,
      reasoningEffort: 'low',
      verbosity: 'medium',
      stream: true,
      autoCommit: false,
      amend: false,
      ignoredFiles: [],
      timeoutMs: 30_000,
    });
    expect(config.systemPrompt).toBe(DEFAULT_SYSTEM_PROMPT);
  });

  it('should layer user file < project file < package.json < env < flags', async () => {
    writeFileSync(join(home, '.draftcommitrc'), JSON.stringify({ model: 'gpt-5.1-codex', choices: 1, verbosity: 'low' }));
    writeFileSync(join(cwd, '.draftcommitrc'), JSON.stringify({ choices: 2, reasoningEffort: 'high' }));
    writeFileSync(join(cwd, 'package.json'), JSON.stringify({ name: 'demo', draftcommit: { verbosity: 'high' } }));

    const config = await load({ choices: '4' }, { DRAFTCOMMIT_MODEL: 'gpt-5.1-codex-mini' });

    expect(config).toMatchObject({
      model: 'gpt-5.1-codex-mini',
      choices: 4,
      reasoningEffort: 'high',
      verbosity: 'high',
    });
  });

  it('should read the key from the configured environment variable', async () => {
    writeFileSync(join(cwd, '.draftcommitrc'), JSON.stringify({ apiKeyEnvVar: 'LOCAL_LLM_KEY' }));

    const config = await load({}, { OPENAI_API_KEY: 'test-secret-other', LOCAL_LLM_KEY: 'test-secret' });

    expect(config.apiKey).toBe('test-secret');
  });

  it('should let the flag override the key from the environment', async () => {
    const config = await load({ apiKey: 'test-secret-flag' }, { OPENAI_API_KEY: 'test-secret' });

    expect(config.apiKey).toBe('test-secret-flag');
  });

  it('should use the file given with --config instead of the user file', async () => {
    writeFileSync(join(home, '.draftcommitrc'), JSON.stringify({ model: 'gpt-5.1-codex' }));
    writeFileSync(join(cwd, 'team.json'), JSON.stringify({ verbosity: 'high' }));

    const config = await load({ config: 'team.json' });

    expect(config).toMatchObject({ model: 'gpt-5.1', verbosity: 'high' });
  });

  it('should fail when the --config file does not exist', async () => {
    const error = await configError({ config: 'missing.json' });

    expect(error?.issues).toEqual([{ field: 'config', message: `file not found: ${join(cwd, 'missing.json')}` }]);
  });

  it('should merge ignore file patterns after configured ones', async () => {
    writeFileSync(join(cwd, '.draftcommitrc'), JSON.stringify({ ignoredFiles: ['dist/**'] }));
    writeFileSync(join(cwd, '.draftcommitignore'), '# generated\n*.lock\n\n  coverage/**  \n');

    const config = await load();

    expect(config.ignoredFiles).toEqual(['dist/**', '*.lock', 'coverage/**']);
  });

  it('should force a single choice in auto-commit mode', async () => {
    const config = await load({ autoCommit: true, choices: '3' });

    expect(config.choices).toBe(1);
  });

  it('should turn streaming off with --print-once', async () => {
    expect((await load({ printOnce: true })).stream).toBe(false);
  });

  it('should load the system prompt from a file', async () => {
    writeFileSync(join(cwd, 'prompt.txt'), '  Write terse messages.  \n');

    const config = await load({ systemPromptFile: 'prompt.txt' });

    expect(config.systemPrompt).toBe('Write terse messages.');
  });

  it('should report a missing system prompt file', async () => {
    const error = await configError({ systemPromptFile: 'nope.txt' });

    expect(error?.issues[0].field).toBe('systemPromptFile');
  });

  it('should name the invalid field and the file it came from', async () => {
    const rc = join(cwd, '.draftcommitrc');
    writeFileSync(rc, JSON.stringify({ choices: 'many' }));

    const error = await configError();

    expect(error?.issues.map((issue) => issue.field)).toEqual(['choices']);
    expect(error?.source).toBe(rc);
  });

  it('should reject unknown keys in a config file', async () => {
    writeFileSync(join(cwd, '.draftcommitrc'), JSON.stringify({ colour: 'red' }));

    const error = await configError();

    expect(error?.issues[0].field).toBe('(root)');
    expect(error?.issues[0].message).toContain('colour');
  });

  it('should reject a config file that is not JSON', async () => {
    writeFileSync(join(cwd, '.draftcommitrc'), '{ model: ');

    const error = await configError();

    expect(error?.issues[0].field).toBe('(file)');
  });

  it('should reject an unknown reasoning effort from the command line', async () => {
    const error = await configError({ reasoningEffort: 'extreme' });

    expect(error?.issues.map((issue) => issue.field)).toEqual(['reasoningEffort']);
    expect(error?.source).toBeUndefined();
  });
});
