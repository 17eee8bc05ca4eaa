import fs from 'fs';
import type { TlsConfig } from './index';
import { ConfigError } from '../utils/errors';

export interface TlsCredentials {
  cert: Buffer;
  key: Buffer;
}

/**
 * Read the certificate and key, failing with every missing path at once.
 */
export function loadTlsCredentials(tls: TlsConfig): TlsCredentials {
  const problems: string[] = [];
  if (!fs.existsSync(tls.certFile)) {
    problems.push(`certificate file not found: ${tls.certFile}`);
  }
  if (!fs.existsSync(tls.keyFile)) {
    problems.push(`key file not found: ${tls.keyFile}`);
  }
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    cert: fs.readFileSync(tls.certFile),
    key: fs.readFileSync(tls.keyFile),
  };
}
