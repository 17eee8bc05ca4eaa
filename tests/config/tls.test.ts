import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { loadTlsCredentials } from '../../src/config/tls';
import { ConfigError } from '../../src/utils/errors';

describe('loadTlsCredentials', () => {
  let dir: string;
  let certFile: string;
  let keyFile: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sms-inbox-tls-'));
    certFile = path.join(dir, 'server.crt');
    keyFile = path.join(dir, 'server.key');
    fs.writeFileSync(certFile, 'test-certificate');
    fs.writeFileSync(keyFile, 'test-key');
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads both files', () => {
    const credentials = loadTlsCredentials({ certFile, keyFile });
    expect(credentials.cert.toString()).toBe('test-certificate');
    expect(credentials.key.toString()).toBe('test-key');
  });

  it('reports every missing file', () => {
    const missingCert = path.join(dir, 'missing.crt');
    const missingKey = path.join(dir, 'missing.key');

    expect(() => loadTlsCredentials({ certFile: missingCert, keyFile: missingKey })).toThrow(ConfigError);
    expect(() => loadTlsCredentials({ certFile: missingCert, keyFile: missingKey })).toThrow(
      `Invalid configuration: certificate file not found: ${missingCert}; key file not found: ${missingKey}`
    );
  });

  it('reports a missing key alone', () => {
    const missingKey = path.join(dir, 'missing.key');
    expect(() => loadTlsCredentials({ certFile, keyFile: missingKey })).toThrow(
      `Invalid configuration: key file not found: ${missingKey}`
    );
  });
});
