/**
 * Master Key Manager
 *
 * Priority order for master key loading:
 * 1. Environment variable: PIERRE_MASTER_KEY (64 hex chars)
 * 2. File: {dataDir}/master_key
 * 3. Auto-generate: create a new key and save it to the file (0600)
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger.js';

const KEY_FILE = 'master_key';
const HEX_KEY = /^[0-9a-f]{64}$/i;

export class MasterKeyManager {
  constructor(
    private readonly dataDir: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * @throws Error if the environment or file key is not 64 hex characters
   */
  loadMasterKey(): Buffer {
    const envKey = this.env.PIERRE_MASTER_KEY;
    if (envKey) {
      if (!HEX_KEY.test(envKey)) {
        throw new Error('PIERRE_MASTER_KEY must be 64 hex characters (32 bytes)');
      }
      logger.info('[master-key] Loaded from environment variable');
      return Buffer.from(envKey, 'hex');
    }

    const keyPath = path.join(this.dataDir, KEY_FILE);
    if (fs.existsSync(keyPath)) {
      const keyHex = fs.readFileSync(keyPath, 'utf8').trim();
      if (!HEX_KEY.test(keyHex)) {
        throw new Error(`Master key file ${keyPath} is corrupt`);
      }
      logger.info('[master-key] Loaded from file');
      return Buffer.from(keyHex, 'hex');
    }

    const newKey = crypto.randomBytes(32);
    fs.mkdirSync(this.dataDir, { recursive: true, mode: 0o700 });
    const tmpPath = keyPath + '.tmp';
    fs.writeFileSync(tmpPath, newKey.toString('hex'), { mode: 0o600 });
    fs.renameSync(tmpPath, keyPath);
    logger.warn({ keyPath }, '[master-key] Generated new master key and saved to file');
    return newKey;
  }
}
