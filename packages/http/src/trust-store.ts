import { X509Certificate } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import tls from 'node:tls';

import { getErrorMessage } from './types.js';

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Filesystem and system-root access, injectable for tests
 */
export interface TrustStoreEffects {
  listDirectory: (dirPath: string) => DirectoryEntry[];
  /**
   * The default returns Node's bundled Mozilla CA list (`tls.rootCertificates`),
   * not the operating system store, so CAs installed on the host are not
   * included. Point `caFile` or `caPath` at them instead.
   */
  loadSystemRoots: () => readonly string[];
  readFile: (filePath: string) => string;
}

export interface TrustStoreOptions {
  caFile?: string | undefined;
  caPath?: string | undefined;
}

export interface SkippedCertificateSource {
  path: string;
  reason: string;
}

export interface TrustStore {
  /** PEM-encoded certificates, system roots first, without duplicates */
  certificates: string[];
  systemRootsLoaded: boolean;
  /** Sources that were unreadable or held no parsable certificate */
  skipped: SkippedCertificateSource[];
}

const PEM_CERTIFICATE_PATTERN = /-----BEGIN CERTIFICATE-----[\s\S]*?-----END CERTIFICATE-----/g;

export const defaultTrustStoreEffects: TrustStoreEffects = {
  listDirectory: (dirPath) =>
    fs.readdirSync(dirPath, { withFileTypes: true }).map((entry) => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
    })),
  loadSystemRoots: () => tls.rootCertificates,
  readFile: (filePath) => fs.readFileSync(filePath, 'utf8'),
};

/**
 * Extracts every certificate block from PEM text that parses as X.509.
 * Blocks that fail to parse are dropped; other PEM blocks (keys) are ignored.
 */
export function parsePemCertificates(pem: string): string[] {
  const blocks = pem.match(PEM_CERTIFICATE_PATTERN) ?? [];
  return blocks.filter((block) => {
    try {
      new X509Certificate(block);
      return true;
    } catch {
      return false;
    }
  });
}

/**
 * Builds the trust pool: system roots (or nothing if they cannot be loaded),
 * then the CA file, then every non-directory entry of the CA directory in name
 * order. Unreadable or unparsable sources are recorded in `skipped` and never
 * fail the build.
 */
export function buildTrustStore(options: TrustStoreOptions, effects: Partial<TrustStoreEffects> = {}): TrustStore {
  const { listDirectory, loadSystemRoots, readFile } = { ...defaultTrustStoreEffects, ...effects };
  const certificates = new Set<string>();
  const skipped: SkippedCertificateSource[] = [];

  let systemRootsLoaded = false;
  try {
    for (const root of loadSystemRoots()) {
      certificates.add(root.trim());
    }
    systemRootsLoaded = true;
  } catch {
    certificates.clear();
  }

  const addFromFile = (filePath: string): void => {
    let pem: string;
    try {
      pem = readFile(filePath);
    } catch (error) {
      skipped.push({ path: filePath, reason: getErrorMessage(error) });
      return;
    }

    const parsed = parsePemCertificates(pem);
    if (parsed.length === 0) {
      skipped.push({ path: filePath, reason: 'no certificates found' });
      return;
    }
    for (const certificate of parsed) {
      certificates.add(certificate);
    }
  };

  if (options.caFile !== undefined) {
    addFromFile(options.caFile);
  }

  if (options.caPath !== undefined) {
    const caPath = options.caPath;
    let entries: DirectoryEntry[] = [];
    try {
      entries = listDirectory(caPath);
    } catch (error) {
      skipped.push({ path: caPath, reason: getErrorMessage(error) });
    }

    const files = entries
      .filter((entry) => !entry.isDirectory)
      .map((entry) => entry.name)
      .sort();
    for (const name of files) {
      addFromFile(path.join(caPath, name));
    }
  }

  return { certificates: [...certificates], systemRootsLoaded, skipped };
}
