#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { findPackageRoot } from '../src/core/paths';
import { channelsCommand, rerankCommand, rrfCommand, seedCommand, sensitivityCommand } from '../src/cli/commands';

function readVersionFromPackageJson(): string {
  const root = findPackageRoot(__dirname);
  if (!root) return '0.0.0';
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(path.join(root, 'package.json'), 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function main() {
  const program = new Command();
  program
    .name('retrieval-harness')
    .description('Retrieval-quality evaluation: channels, fusion, reranking and threshold sensitivity')
    .version(readVersionFromPackageJson());

  program.addCommand(seedCommand);
  program.addCommand(channelsCommand);
  program.addCommand(rrfCommand);
  program.addCommand(rerankCommand);
  program.addCommand(sensitivityCommand);
  program.parse(process.argv);
}

main();
