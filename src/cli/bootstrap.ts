#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';
import { config as dotenvConfig } from 'dotenv';

import { registerDeviceCommands } from './commands/device.js';

dotenvConfig();

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function findPackageJson(startDir: string): string {
  let dir = startDir;
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    dir = path.dirname(dir);
  }

  throw new Error('Could not find package.json');
}

function resolveCliVersion(): string {
  const envVersion = process.env.MIC_BRIDGE_VERSION;
  if (envVersion) {
    return envVersion;
  }

  try {
    const packageJson: unknown = JSON.parse(fs.readFileSync(findPackageJson(__dirname), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return typeof packageJson.version === 'string' ? packageJson.version : 'unknown';
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

export const VERSION = resolveCliVersion();

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mic-bridge')
    .description('Bridge a networked microphone client to a voice pipeline')
    .version(VERSION, '-V, --version', 'Output the version number');

  registerDeviceCommands(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<Command> {
  const program = createProgram();
  await program.parseAsync(argv);
  return program;
}

function isEntrypoint(): boolean {
  const invocationPath = process.argv[1];
  if (!invocationPath) {
    return false;
  }
  try {
    return fs.realpathSync(invocationPath) === fs.realpathSync(__filename);
  } catch {
    return path.resolve(invocationPath) === __filename;
  }
}

if (isEntrypoint()) {
  runCli().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
