import { X509Certificate } from 'node:crypto';
import fs from 'node:fs';
import tls from 'node:tls';

import { err, ok, type Result } from 'neverthrow';

import { ClientCertificateError, getErrorMessage } from './types.js';

export interface ClientCertificate {
  cert: string;
  key: string;
  certPath: string;
  keyPath: string;
  subject: string;
}

export interface ClientCertificateEffects {
  readFile: (filePath: string) => string;
}

const defaultEffects: ClientCertificateEffects = {
  readFile: (filePath) => fs.readFileSync(filePath, 'utf8'),
};

/**
 * Reads a PEM certificate and private key and checks that they form a usable
 * pair. Fails when either file is missing, either PEM is malformed, or the key
 * does not belong to the certificate.
 */
export function loadClientCertificate(
  certPath: string,
  keyPath: string,
  effects: Partial<ClientCertificateEffects> = {}
): Result<ClientCertificate, ClientCertificateError> {
  const { readFile } = { ...defaultEffects, ...effects };

  let cert: string;
  let key: string;
  try {
    cert = readFile(certPath);
  } catch (error) {
    return err(
      new ClientCertificateError(`Failed to read client certificate: ${getErrorMessage(error)}`, certPath, keyPath, {
        cause: error,
      })
    );
  }
  try {
    key = readFile(keyPath);
  } catch (error) {
    return err(
      new ClientCertificateError(`Failed to read client key: ${getErrorMessage(error)}`, certPath, keyPath, {
        cause: error,
      })
    );
  }

  try {
    // Throws on malformed PEM and on a key that does not match the certificate
    tls.createSecureContext({ cert, key });
    const { subject } = new X509Certificate(cert);
    return ok({ cert, key, certPath, keyPath, subject });
  } catch (error) {
    return err(
      new ClientCertificateError(`Invalid client certificate/key pair: ${getErrorMessage(error)}`, certPath, keyPath, {
        cause: error,
      })
    );
  }
}
