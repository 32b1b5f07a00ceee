#!/usr/bin/env node
/**
 * slack-notify - 命令列進入點
 */

import { config } from 'dotenv';
import { runCli } from './interfaces/cli.js';

config();

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
