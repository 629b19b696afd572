#!/usr/bin/env node

import dotenv from 'dotenv';
import { formatError, runCommand } from './cli/commands.js';
import { createClient } from './config.js';

dotenv.config();

async function main() {
  const client = createClient();
  const result = await runCommand(client, process.argv.slice(2));
  console.log(JSON.stringify(result, null, 2));
}

main().catch((error) => {
  console.error(formatError(error));
  process.exit(1);
});
