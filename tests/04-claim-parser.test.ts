// =============================================================================
// CLAIMER — Test Suite 04: Claim Input Parser
// =============================================================================

import { randomBytes } from 'crypto';
import { deferredBody, parseClaimInput, parseClaimJson } from '../src/services/claims';
import { encryptPayload } from '../src/services/crypto';
import { catchClaimError, makeClaimFixture, ZERO_KEY_HEX } from './helpers';

const DECRYPTER_URL = 'https://decrypter.test/claim';
const deferred = { decrypterUrl: DECRYPTER_URL };

describe('Direct messages', () => {
  test('normalizes a direct message', () => {
    const message = parseClaimInput(
      { recipients: ['a@x.com'], contentHash: '0xdead', message: 'hi', subject: 's' },
      deferred
    );

    expect(message).toEqual({
      recipients: ['a@x.com'],
      contentHash: '0xdead',
      body: 'hi',
      subject: 's',
      source: 'direct',
    });
  });

  test('subject defaults to empty', () => {
    const message = parseClaimInput({ recipients: ['a@x.com'], contentHash: '0x01', message: 'hi' }, deferred);
    expect(message.subject).toBe('');
  });

  test('an unknown type marker is treated as a direct message', () => {
    const message = parseClaimInput(
      { type: 'something-else', recipients: ['a@x.com'], contentHash: '0x01', message: 'hi' },
      deferred
    );
    expect(message.source).toBe('direct');
    expect(message.body).toBe('hi');
  });

  test('does not require claim-package fields, even with a secret', () => {
    const message = parseClaimInput(
      { recipients: ['a@x.com'], contentHash: '0x01', message: 'hi' },
      { ...deferred, secret: ZERO_KEY_HEX }
    );
    expect(message.body).toBe('hi');
  });

  test('missing message names the field', () => {
    const err = catchClaimError(() => parseClaimInput({ recipients: ['a@x.com'], contentHash: '0x01' }, deferred));
    expect(err.code).toBe('MissingField');
    expect(err.field).toBe('message');
    expect(err.message).toBe('MissingField: direct message is missing required field "message"');
  });

  test('non-string message is malformed', () => {
    const err = catchClaimError(() =>
      parseClaimInput({ recipients: ['a@x.com'], contentHash: '0x01', message: 42 }, deferred)
    );
    expect(err.code).toBe('MalformedInput');
    expect(err.field).toBe('message');
  });
});

describe('Shared field validation', () => {
  test('missing recipients names the field', () => {
    const err = catchClaimError(() => parseClaimInput({ contentHash: '0x01', message: 'hi' }, deferred));
    expect(err.code).toBe('MissingField');
    expect(err.field).toBe('recipients');
  });

  test('missing contentHash names the field', () => {
    const err = catchClaimError(() => parseClaimInput({ recipients: ['a@x.com'], message: 'hi' }, deferred));
    expect(err.code).toBe('MissingField');
    expect(err.field).toBe('contentHash');
  });

  test('empty recipients is malformed', () => {
    const err = catchClaimError(() =>
      parseClaimInput({ recipients: [], contentHash: '0x01', message: 'hi' }, deferred)
    );
    expect(err.code).toBe('MalformedInput');
    expect(err.message).toBe('MalformedInput: recipients must contain at least one address');
  });

  test('recipients that is not a list is malformed', () => {
    const err = catchClaimError(() =>
      parseClaimInput({ recipients: 'a@x.com', contentHash: '0x01', message: 'hi' }, deferred)
    );
    expect(err.code).toBe('MalformedInput');
  });

  test('address without @ is malformed and names its index', () => {
    const err = catchClaimError(() =>
      parseClaimInput({ recipients: ['a@x.com', 'nobody'], contentHash: '0x01', message: 'hi' }, deferred)
    );
    expect(err.code).toBe('MalformedInput');
    expect(err.recipientIndex).toBe(1);
    expect(err.message).toBe('MalformedInput: recipients[1] "nobody" is not a valid email address');
  });

  test('address with surrounding whitespace is malformed', () => {
    const err = catchClaimError(() =>
      parseClaimInput({ recipients: [' a@x.com'], contentHash: '0x01', message: 'hi' }, deferred)
    );
    expect(err.code).toBe('MalformedInput');
    expect(err.recipientIndex).toBe(0);
  });

  test('non-hex contentHash is malformed', () => {
    const err = catchClaimError(() =>
      parseClaimInput({ recipients: ['a@x.com'], contentHash: 'dead-beef', message: 'hi' }, deferred)
    );
    expect(err.code).toBe('MalformedInput');
    expect(err.field).toBe('contentHash');
  });

  test('contentHash without 0x gains the prefix', () => {
    const message = parseClaimInput({ recipients: ['a@x.com'], contentHash: 'deadbeef', message: 'hi' }, deferred);
    expect(message.contentHash).toBe('0xdeadbeef');
  });

  test('digit-only contentHash is kept as hex, not decimal', () => {
    const message = parseClaimInput({ recipients: ['a@x.com'], contentHash: '1234', message: 'hi' }, deferred);
    expect(message.contentHash).toBe('0x1234');
  });

  test.each([null, 'text', 7])('non-object input %p is malformed', input => {
    const err = catchClaimError(() => parseClaimInput(input, deferred));
    expect(err.code).toBe('MalformedInput');
    expect(err.message).toBe('MalformedInput: claim input must be a JSON object');
  });

  test('array input is malformed', () => {
    const err = catchClaimError(() => parseClaimInput(['a@x.com'], deferred));
    expect(err.code).toBe('MalformedInput');
  });
});

describe('Claim packages without the secret', () => {
  test('body is the placeholder pointing at the external decrypter', () => {
    const { claimPackage } = makeClaimFixture('secret words');
    const message = parseClaimInput(claimPackage, deferred);

    expect(message.source).toBe('deferred');
    expect(message.body).toBe(deferredBody(DECRYPTER_URL));
    expect(message.body).toContain(DECRYPTER_URL);
    expect(message.recipients).toEqual(['alice@example.com']);
    expect(message.subject).toBe('Until next time');
  });

  test('skShare and encryptedPayload are optional', () => {
    const message = parseClaimInput(
      { type: 'farewell-claim-package', recipients: ['a@x.com'], contentHash: '0x01' },
      deferred
    );
    expect(message.source).toBe('deferred');
  });

  test('carries owner and messageIndex', () => {
    const { claimPackage } = makeClaimFixture('secret words');
    const message = parseClaimInput(claimPackage, deferred);

    expect(message.owner).toBe('0x1111111111111111111111111111111111111111');
    expect(message.messageIndex).toBe(2);
  });

  test('rejects a negative messageIndex', () => {
    const { claimPackage } = makeClaimFixture('secret words');
    const err = catchClaimError(() => parseClaimInput({ ...claimPackage, messageIndex: -1 }, deferred));
    expect(err.code).toBe('MalformedInput');
    expect(err.field).toBe('messageIndex');
  });
});

describe('Claim packages with the secret', () => {
  test('decrypts the payload into the body', () => {
    const { claimPackage, secret } = makeClaimFixture('Look after each other.', ['a@x.com', 'b@y.org']);
    const message = parseClaimInput(claimPackage, { ...deferred, secret });

    expect(message).toEqual({
      recipients: ['a@x.com', 'b@y.org'],
      contentHash: claimPackage.contentHash,
      body: 'Look after each other.',
      subject: 'Until next time',
      source: 'decrypted',
      owner: claimPackage.owner,
      messageIndex: 2,
    });
  });

  test('wrong secret fails authentication', () => {
    const { claimPackage } = makeClaimFixture('private');
    const err = catchClaimError(() =>
      parseClaimInput(claimPackage, { ...deferred, secret: randomBytes(16).toString('hex') })
    );
    expect(err.code).toBe('DecryptionAuthFailure');
  });

  test('short secret is a key length mismatch', () => {
    const { claimPackage } = makeClaimFixture('private');
    const err = catchClaimError(() => parseClaimInput(claimPackage, { ...deferred, secret: 'abcd' }));
    expect(err.code).toBe('KeyLengthMismatch');
  });

  test('missing skShare names the field', () => {
    const { claimPackage, secret } = makeClaimFixture('private');
    const { skShare: _skShare, ...withoutShare } = claimPackage;
    const err = catchClaimError(() => parseClaimInput(withoutShare, { ...deferred, secret }));
    expect(err.code).toBe('MissingField');
    expect(err.field).toBe('skShare');
  });

  test('missing encryptedPayload names the field', () => {
    const { claimPackage, secret } = makeClaimFixture('private');
    const { encryptedPayload: _payload, ...withoutPayload } = claimPackage;
    const err = catchClaimError(() => parseClaimInput(withoutPayload, { ...deferred, secret }));
    expect(err.code).toBe('MissingField');
    expect(err.field).toBe('encryptedPayload');
  });

  test('truncated payload is malformed', () => {
    const { claimPackage, secret } = makeClaimFixture('private');
    const err = catchClaimError(() =>
      parseClaimInput({ ...claimPackage, encryptedPayload: '0x' + '00'.repeat(20) }, { ...deferred, secret })
    );
    expect(err.code).toBe('MalformedPayload');
  });

  test('all-zero share and secret decrypt a zero-key payload', () => {
    const message = parseClaimInput(
      {
        type: 'farewell-claim-package',
        recipients: ['a@x.com'],
        skShare: ZERO_KEY_HEX,
        encryptedPayload: encryptPayload(Buffer.alloc(16), 'zero'),
        contentHash: '0x01',
      },
      { ...deferred, secret: ZERO_KEY_HEX }
    );
    expect(message.body).toBe('zero');
    expect(message.source).toBe('decrypted');
  });
});

describe('parseClaimJson', () => {
  test('parses JSON text', () => {
    const message = parseClaimJson(
      '{"recipients":["a@x.com"],"contentHash":"0xdead","message":"hi","subject":"s"}',
      deferred
    );
    expect(message.body).toBe('hi');
    expect(message.recipients).toEqual(['a@x.com']);
  });

  test('invalid JSON is malformed', () => {
    const err = catchClaimError(() => parseClaimJson('{"recipients": [', deferred));
    expect(err.code).toBe('MalformedInput');
  });
});
