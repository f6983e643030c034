#!/usr/bin/env node

import { Command } from 'commander';
import { registerRenderCommand } from './commands/render.js';
import { registerInstallBrowsersCommand } from './commands/install-browsers.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('lead-render')
    .description('Render lead websites in parallel with headless Chromium')
    .version('0.1.0');

  registerInstallBrowsersCommand(program);
  registerRenderCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
