// =============================================================================
// CLAIMER — Test Helpers
//
// Starts the HTTP app in-process on an ephemeral port and provides a small
// fetch-based client plus claim-fixture builders.
// =============================================================================

import { randomBytes } from 'crypto';
import { Server } from 'http';
import { AppOptions, createApp } from '../src/app';
import { ClaimError } from '../src/errors';
import { deriveKeyShare, encodeHex, encryptPayload } from '../src/services/crypto';
import { CLAIM_PACKAGE_TYPE } from '../src/types/claim';

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Start the app on 127.0.0.1 with a random free port. */
export async function startServer(options: AppOptions = {}): Promise<TestServer> {
  const app = createApp(options);
  const server = await new Promise<Server>(resolve => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error(`Unexpected server address: ${String(address)}`);
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(err => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * Make a JSON API request against a test server.
 * Returns the raw Response object for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  path: string,
  body?: unknown,
): Promise<Response> {
  const headers: Record<string, string> = {};
  const opts: RequestInit = { method, headers };

  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
    opts.body = JSON.stringify(body);
  }

  return fetch(`${server.baseUrl}${path}`, opts);
}

/**
 * Parse JSON response with error context.
 */
export async function json(res: Response) {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}

/** Run fn and return the ClaimError it throws. */
export function catchClaimError(fn: () => unknown): ClaimError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ClaimError) return err;
    throw err;
  }
  throw new Error('Expected a ClaimError but nothing was thrown');
}

export const ZERO_KEY_HEX = '00'.repeat(16);

export interface ClaimFixture {
  key: Buffer;
  secret: string;
  claimPackage: {
    type: string;
    recipients: string[];
    skShare: string;
    encryptedPayload: string;
    contentHash: string;
    subject: string;
    owner: string;
    messageIndex: number;
  };
}

/** Build a claim package whose payload decrypts to `message` with `secret`. */
export function makeClaimFixture(
  message: string,
  recipients: string[] = ['alice@example.com'],
  key: Buffer = randomBytes(16),
  secret: string = randomBytes(16).toString('hex'),
): ClaimFixture {
  return {
    key,
    secret,
    claimPackage: {
      type: CLAIM_PACKAGE_TYPE,
      recipients,
      skShare: encodeHex(deriveKeyShare(key, secret)),
      encryptedPayload: encryptPayload(key, message),
      contentHash: `0x${'ab'.repeat(32)}`,
      subject: 'Until next time',
      owner: '0x1111111111111111111111111111111111111111',
      messageIndex: 2,
    },
  };
}
