// src/cli/__tests__/commands.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Command } from 'commander';
import { execFileSync } from 'child_process';
import { installArgs, registerInstallBrowsersCommand } from '../commands/install-browsers.js';
import { buildRendererOptions, resolveSource, type RenderCommandOptions } from '../commands/render.js';

jest.mock('child_process', () => ({
  ...jest.requireActual<typeof import('child_process')>('child_process'),
  execFileSync: jest.fn(),
}));

const defaults: RenderCommandOptions = {
  headful: false,
  blockResources: true,
  jsonl: false,
  includeHtml: false,
  failOnError: false,
  verbose: false,
  quiet: false,
};

describe('CLI Commands - render options', () => {
  it('keeps environment values when no flags are given', () => {
    expect(buildRendererOptions({ maxWorkers: 8, headless: true }, defaults)).toEqual({
      maxWorkers: 8,
      headless: true,
    });
  });

  it('lets flags override the environment', () => {
    const renderer = buildRendererOptions(
      { maxWorkers: 8, timeoutSeconds: 30, userAgent: 'env-agent' },
      {
        ...defaults,
        workers: 2,
        timeout: 5,
        settle: 0,
        headful: true,
        blockResources: false,
        userAgent: 'cli-agent',
      }
    );

    expect(renderer).toEqual({
      maxWorkers: 2,
      timeoutSeconds: 5,
      settleDelayMs: 0,
      headless: false,
      blockResources: false,
      userAgent: 'cli-agent',
    });
  });

  it('does not mutate the base options', () => {
    const base = { maxWorkers: 8 };
    buildRendererOptions(base, { ...defaults, workers: 1 });
    expect(base).toEqual({ maxWorkers: 8 });
  });

  it.each([
    ['file wins over everything', ['https://a.example'], { file: 'leads.txt', stdin: true }, 'file'],
    ['stdin wins over arguments', ['https://a.example'], { stdin: true }, 'stdin'],
    ['arguments', ['https://a.example'], {}, 'args'],
    ['nothing', [], {}, undefined],
  ])('resolves the URL source: %s', (_label, urls, flags, expected) => {
    expect(resolveSource(urls, { ...defaults, ...flags })).toBe(expected);
  });
});

describe('CLI Commands - install-browsers', () => {
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  let exitSpy: jest.SpiedFunction<typeof process.exit>;

  beforeEach(() => {
    jest.mocked(execFileSync).mockReset();
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    exitSpy = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    errorSpy.mockRestore();
    exitSpy.mockRestore();
  });

  it('builds the playwright install arguments', () => {
    expect(installArgs(false)).toEqual(['playwright', 'install', 'chromium']);
    expect(installArgs(true)).toEqual(['playwright', 'install', '--with-deps', 'chromium']);
  });

  it('registers the command', () => {
    const program = new Command();
    registerInstallBrowsersCommand(program);

    const command = program.commands.find((cmd) => cmd.name() === 'install-browsers');
    expect(command?.description()).toBe('Install the Chromium build used for rendering');
  });

  it('installs chromium through npx', async () => {
    const program = new Command();
    registerInstallBrowsersCommand(program);

    await program.parseAsync(['node', 'lead-render', 'install-browsers', '--with-deps']);

    expect(execFileSync).toHaveBeenCalledWith('npx', ['playwright', 'install', '--with-deps', 'chromium'], {
      stdio: 'inherit',
    });
    expect(errorSpy).toHaveBeenCalledWith('✓ Chromium installed');
    expect(exitSpy).not.toHaveBeenCalled();
  });

  it('exits with an error when the install fails', async () => {
    jest.mocked(execFileSync).mockImplementation(() => {
      throw new Error('Command failed: npx playwright install chromium');
    });
    const program = new Command();
    registerInstallBrowsersCommand(program);

    await expect(program.parseAsync(['node', 'lead-render', 'install-browsers'])).rejects.toThrow(
      'process.exit(1)'
    );

    expect(errorSpy).toHaveBeenCalledWith('✗ Failed to install Chromium');
    expect(errorSpy).toHaveBeenCalledWith('Reason: Command failed: npx playwright install chromium');
  });
});
