import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import tls from 'node:tls';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { buildTrustStore, parsePemCertificates } from '../trust-store.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
const readFixture = (name: string) => fs.readFileSync(fixture(name), 'utf8');

const caPem = readFixture('ca.pem').trim();
const serverPem = readFixture('server.pem').trim();
const fakeRoots = () => ['-----BEGIN CERTIFICATE-----\nSYSTEM-ROOT\n-----END CERTIFICATE-----'];

describe('parsePemCertificates', () => {
  it('should return every parsable certificate block', () => {
    const bundle = [readFixture('server.pem'), readFixture('corrupt.pem'), readFixture('ca.pem')].join('\n');

    expect(parsePemCertificates(bundle)).toEqual([serverPem, caPem]);
  });

  it('should ignore private keys and plain text', () => {
    expect(parsePemCertificates(readFixture('client-key.pem'))).toEqual([]);
    expect(parsePemCertificates('not pem at all')).toEqual([]);
  });
});

describe('buildTrustStore', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-ca-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should start from the system roots by default', () => {
    const store = buildTrustStore({});

    expect(store.systemRootsLoaded).toBe(true);
    expect(store.certificates).toHaveLength(new Set(tls.rootCertificates.map((root) => root.trim())).size);
    expect(store.skipped).toEqual([]);
  });

  it('should add the CA file on top of the system roots', () => {
    const store = buildTrustStore({ caFile: fixture('ca.pem') }, { loadSystemRoots: fakeRoots });

    expect(store.certificates).toEqual([fakeRoots()[0], caPem]);
    expect(store.systemRootsLoaded).toBe(true);
  });

  it('should fall back to an empty pool when the system roots cannot be loaded', () => {
    const store = buildTrustStore(
      { caFile: fixture('ca.pem') },
      {
        loadSystemRoots: () => {
          throw new Error('no system store');
        },
      }
    );

    expect(store.systemRootsLoaded).toBe(false);
    expect(store.certificates).toEqual([caPem]);
  });

  it('should keep valid directory entries and skip corrupt ones and subdirectories', () => {
    fs.copyFileSync(fixture('ca.pem'), path.join(tempDir, 'a-valid.pem'));
    fs.copyFileSync(fixture('corrupt.pem'), path.join(tempDir, 'b-corrupt.pem'));
    fs.mkdirSync(path.join(tempDir, 'nested'));
    fs.copyFileSync(fixture('server.pem'), path.join(tempDir, 'nested', 'server.pem'));

    const store = buildTrustStore({ caPath: tempDir }, { loadSystemRoots: fakeRoots });

    expect(store.certificates).toEqual([fakeRoots()[0], caPem]);
    expect(store.skipped).toEqual([{ path: path.join(tempDir, 'b-corrupt.pem'), reason: 'no certificates found' }]);
  });

  it('should combine the CA file and directory without duplicates', () => {
    fs.copyFileSync(fixture('ca.pem'), path.join(tempDir, 'ca.pem'));
    fs.copyFileSync(fixture('server.pem'), path.join(tempDir, 'server.pem'));

    const store = buildTrustStore({ caFile: fixture('ca.pem'), caPath: tempDir }, { loadSystemRoots: fakeRoots });

    expect(store.certificates).toEqual([fakeRoots()[0], caPem, serverPem]);
  });

  it('should record a missing CA file without failing', () => {
    const missing = path.join(tempDir, 'missing.pem');

    const store = buildTrustStore({ caFile: missing }, { loadSystemRoots: fakeRoots });

    expect(store.certificates).toEqual(fakeRoots());
    expect(store.skipped).toHaveLength(1);
    expect(store.skipped[0]?.path).toBe(missing);
    expect(store.skipped[0]?.reason).toContain('ENOENT');
  });

  it('should record an unreadable CA directory without failing', () => {
    const missingDir = path.join(tempDir, 'absent');

    const store = buildTrustStore({ caPath: missingDir }, { loadSystemRoots: fakeRoots });

    expect(store.certificates).toEqual(fakeRoots());
    expect(store.skipped.map((source) => source.path)).toEqual([missingDir]);
  });
});
