#!/usr/bin/env ts-node
/**
 * Account Key Generator
 *
 * Generates an Ed25519 keypair and derives a ve... address.
 * Saves the identity to a JSON file for signing ledger requests.
 *
 * Usage:
 *   npm run create-account
 *   npm run create-account -- --name alice
 *   npm run create-account -- --out accounts/
 *
 * Output: A JSON identity file with:
 *   - address:    ve... (42-char address, used as accountId)
 *   - publicKey:  hex-encoded SPKI DER Ed25519 public key
 *   - secretKey:  hex-encoded PKCS#8 DER Ed25519 secret key
 *   - createdAt:  ISO timestamp
 */

import * as path from 'path';
import * as fs from 'fs';
import { deriveAddress, generateKeyPair } from '../src/crypto';

function main(): void {
  const args = process.argv.slice(2);
  const nameIdx = args.indexOf('--name');
  const outIdx = args.indexOf('--out');

  const accountName = nameIdx >= 0 ? args[nameIdx + 1] : undefined;
  const outDir = outIdx >= 0 ? args[outIdx + 1] : 'accounts';

  console.log('Generating Ed25519 keypair...');

  const { publicKey, secretKey } = generateKeyPair();
  const address = deriveAddress(publicKey);

  console.log(`  Public key:  ${publicKey.length / 2} bytes (${publicKey.length} hex chars)`);
  console.log(`  Address:     ${address}`);

  const identity = {
    address,
    publicKey,
    secretKey,
    createdAt: new Date().toISOString(),
    name: accountName ?? address.slice(0, 12),
    algorithm: 'Ed25519',
  };

  const resolvedDir = path.resolve(outDir);
  fs.mkdirSync(resolvedDir, { recursive: true });

  const fileName = accountName
    ? `${accountName}.identity.json`
    : `${address.slice(0, 16)}.identity.json`;
  const filePath = path.join(resolvedDir, fileName);

  fs.writeFileSync(filePath, JSON.stringify(identity, null, 2) + '\n', { mode: 0o600 });

  console.log(`\n  Identity saved to: ${filePath}`);
  console.log(`\n  Keep the secret key safe. Anyone with it can sign as you.`);
  console.log(`  Register the public key with POST /accounts/register to use "${address}".\n`);
}

try {
  main();
} catch (err) {
  console.error('Error:', err);
  process.exit(1);
}
