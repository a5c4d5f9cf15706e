// packages/cli/src/commands/init.ts

import { existsSync } from 'node:fs';
import { defaultConfigPath, loadConfig, writeConfig, type PresetName } from '@diskcare/core';
import chalk from 'chalk';
import type { Command } from 'commander';
import { selectPreset } from '../prompts.js';
import { readGlobals } from '../utils.js';

interface InitOptions {
  preset?: PresetName;
  force?: boolean;
}

export async function initCommand(options: InitOptions, command: Command): Promise<void> {
  const configPath = readGlobals(command).config ?? defaultConfigPath();

  if (existsSync(configPath) && !options.force) {
    throw new Error(`${configPath} already exists. Use --force to overwrite.`);
  }

  let presetName: PresetName = options.preset ?? 'default';
  if (options.preset === undefined && process.stdin.isTTY) {
    presetName = await selectPreset();
  }

  const config = loadConfig({ preset: presetName, skipFile: true });
  writeConfig(config, configPath);

  console.log(chalk.green(`Wrote ${configPath} with the '${presetName}' preset`));
  console.log(chalk.gray('\nNext: diskcare scan'));
}
