#!/usr/bin/env node
import { reportFailure, runApp } from './app.js';
import config from './utils/config.js';
import { loadSecrets } from './utils/secrets.js';

async function main(): Promise<void> {
  const secrets = await loadSecrets(config.paths.secrets);
  await runApp(config, secrets);
}

main().catch(error => {
  reportFailure(error);
  process.exitCode = 1;
});
