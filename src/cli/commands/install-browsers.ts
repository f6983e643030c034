// src/cli/commands/install-browsers.ts
import { Command } from 'commander';
import { execFileSync } from 'child_process';

export function installArgs(withDeps: boolean): string[] {
  return withDeps
    ? ['playwright', 'install', '--with-deps', 'chromium']
    : ['playwright', 'install', 'chromium'];
}

export function registerInstallBrowsersCommand(program: Command): void {
  program
    .command('install-browsers')
    .description('Install the Chromium build used for rendering')
    .option('--with-deps', 'Also install system dependencies (needs root)', false)
    .action((options: { withDeps: boolean }) => {
      try {
        execFileSync('npx', installArgs(options.withDeps), {
          stdio: 'inherit',
        });
        console.error('✓ Chromium installed');
      } catch (error) {
        console.error('✗ Failed to install Chromium');
        console.error(`Reason: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    });
}
