// packages/cli/src/prompts.ts — Interactive questions (TTY only)

import type { PresetName } from '@diskcare/core';
import inquirer from 'inquirer';

export async function selectPreset(): Promise<PresetName> {
  const { preset } = await inquirer.prompt<{ preset: PresetName }>([
    {
      type: 'list',
      name: 'preset',
      message: 'Select a preset:',
      choices: [
        { name: 'Default - junk, caches, apps and privacy traces (recommended)', value: 'default' },
        { name: 'Aggressive - also language bundles and browser caches, shorter age limits', value: 'aggressive' },
      ],
    },
  ]);
  return preset;
}

export async function confirmFix(message: string): Promise<boolean> {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    { type: 'confirm', name: 'proceed', message, default: false },
  ]);
  return proceed;
}
