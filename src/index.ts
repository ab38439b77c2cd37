#!/usr/bin/env node
import { exitCodeFor, parseUploadArgs, runUpload } from './commands/upload.js';
import { describeError } from './errors.js';
import { logError } from './utils/progress.js';

function printUsage() {
  console.error('Usage:');
  console.error('  photos-upload upload <FILE> [--album-id ID] [--album-name NAME] [--name NAME] [--credentials PATH] [--quiet-success]');
}

async function main() {
  const command = process.argv[2];

  if (command === 'upload') {
    const args = parseUploadArgs(process.argv.slice(3));
    const outcome = await runUpload(args);
    process.exitCode = exitCodeFor(outcome);
    return;
  }

  printUsage();
  process.exit(1);
}

main().catch(error => {
  logError(describeError(error));
  process.exit(1);
});
