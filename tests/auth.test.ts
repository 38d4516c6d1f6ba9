import {
  buildAuthorization,
  createSalt,
  formatDate,
  getAuthorization,
  parseAuthorization,
  sign,
} from '../src/auth';

const HEX_64 = /^[0-9a-f]{64}$/;

describe('sign', () => {
  test('matches a reference HMAC-SHA256 vector', () => {
    // date and salt are concatenated with no separator
    expect(sign('Jefe', 'what do ya want ', 'for nothing?')).toBe(
      '5bdcc146bf60754e6a042426089575c75a003f089d2739839dec58b964ec3843'
    );
  });

  test('is deterministic for fixed inputs', () => {
    const date = '2024-03-01T09:30:00Z';
    const salt = 'a1b2c3d4e5f6a1b2c3d4e5f6a1b2c3d4e5f6a1b2';
    expect(sign('test-secret', date, salt)).toBe(sign('test-secret', date, salt));
    expect(sign('test-secret', date, salt)).not.toBe(sign('other-secret', date, salt));
  });

  test('produces a valid digest for an empty secret', () => {
    expect(sign('', '', '')).toBe(
      'b613679a0814d9ec772f95d778c35fc5ff1697c493715653c6c712144292c5ad'
    );
  });
});

describe('createSalt', () => {
  test('encodes 20 random bytes as hex by default', () => {
    expect(createSalt()).toMatch(/^[0-9a-f]{40}$/);
  });

  test('never goes below 20 bytes', () => {
    expect(createSalt(4)).toHaveLength(40);
    expect(createSalt(32)).toHaveLength(64);
  });

  test('differs between calls', () => {
    expect(createSalt()).not.toBe(createSalt());
  });
});

describe('formatDate', () => {
  test('writes an RFC 3339 timestamp with second precision', () => {
    const date = new Date(Date.UTC(2024, 2, 1, 9, 30, 15, 750));
    const formatted = formatDate(date);
    expect(formatted).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(Z|[+-]\d{2}:\d{2})$/);
    expect(new Date(formatted).getTime()).toBe(Date.UTC(2024, 2, 1, 9, 30, 15));
  });
});

describe('buildAuthorization', () => {
  test('joins the parts as comma separated key=value pairs', () => {
    expect(
      buildAuthorization({
        apiKey: 'test-key',
        date: '2024-03-01T09:30:00Z',
        salt: 'abc',
        signature: 'def',
      })
    ).toBe('HMAC-SHA256 apiKey=test-key, date=2024-03-01T09:30:00Z, salt=abc, signature=def');
  });
});

describe('getAuthorization', () => {
  const credentials = { apiKey: 'test-key', apiSecret: 'test-secret' };

  test('signs the timestamp and salt it carries', () => {
    const now = new Date(Date.UTC(2024, 2, 1, 9, 30, 0));
    const parts = parseAuthorization(getAuthorization(credentials, now));
    expect(parts).not.toBeNull();
    if (!parts) return;
    expect(parts.apiKey).toBe('test-key');
    expect(parts.date).toBe(formatDate(now));
    expect(parts.salt).toMatch(/^[0-9a-f]{40}$/);
    expect(parts.signature).toBe(sign('test-secret', parts.date, parts.salt));
  });

  test('never reuses a salt or signature', () => {
    const now = new Date(Date.UTC(2024, 2, 1, 9, 30, 0));
    const first = parseAuthorization(getAuthorization(credentials, now));
    const second = parseAuthorization(getAuthorization(credentials, now));
    expect(first?.salt).not.toBe(second?.salt);
    expect(first?.signature).not.toBe(second?.signature);
  });

  test('still builds a complete header without credentials', () => {
    const header = getAuthorization({ apiKey: '', apiSecret: '' });
    expect(header.startsWith('HMAC-SHA256 apiKey=, date=')).toBe(true);
    const parts = parseAuthorization(header);
    expect(parts?.apiKey).toBe('');
    expect(parts?.signature).toMatch(HEX_64);
  });
});

describe('parseAuthorization', () => {
  test('rejects other schemes', () => {
    expect(parseAuthorization('Bearer test-token')).toBeNull();
  });

  test('rejects a header with missing fields', () => {
    expect(parseAuthorization('HMAC-SHA256 apiKey=test-key, date=x')).toBeNull();
  });
});
