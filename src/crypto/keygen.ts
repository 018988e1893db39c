#!/usr/bin/env tsx

import { resolve } from 'path';
import { homedir } from 'os';
import { generateKeyPair, saveKeyPair, loadKeyPair } from './signer.js';
import { createLogger } from '../logger.js';

const DEFAULT_KEY_DIR = resolve(homedir(), '.dispatch-shield', 'keys');

const logger = createLogger('keygen');

function main(): void {
  const keyDir = process.argv[2] || DEFAULT_KEY_DIR;
  logger.info({ keyDir }, 'Audit signing key generator');

  if (loadKeyPair(keyDir)) {
    logger.error({ keyDir }, 'Keys already exist at this location; delete them first to regenerate');
    process.exitCode = 1;
    return;
  }

  saveKeyPair(keyDir, generateKeyPair());

  logger.info({ keyDir }, 'Ed25519 key pair written (private key mode 600). Keep the private key out of version control');
}

main();
