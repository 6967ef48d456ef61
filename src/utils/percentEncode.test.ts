import { describe, it, expect } from 'vitest';
import { percentEncode } from './percentEncode.js';

describe('percentEncode', () => {
  it('encodes spaces as %20', () => {
    expect(percentEncode('hello world')).toBe('hello%20world');
    expect(percentEncode('King Gizzard and the Lizard Wizard')).toBe(
      'King%20Gizzard%20and%20the%20Lizard%20Wizard'
    );
  });

  it('leaves unreserved characters untouched', () => {
    expect(percentEncode('ABC123')).toBe('ABC123');
    expect(percentEncode('a-b_c~d.e')).toBe('a-b_c~d.e');
    expect(percentEncode(percentEncode('ABC123'))).toBe('ABC123');
  });

  it('uses lowercase hex for reserved characters', () => {
    expect(percentEncode("!#$&'()*+,/:;=?@[]")).toBe(
      '%21%23%24%26%27%28%29%2a%2b%2c%2f%3a%3b%3d%3f%40%5b%5d'
    );
  });

  it('zero-pads control characters', () => {
    expect(percentEncode('\n')).toBe('%0a');
  });

  it('emits one escape per UTF-8 byte', () => {
    expect(percentEncode('€')).toBe('%e2%82%ac');
    expect(percentEncode('Björk')).toBe('Bj%c3%b6rk');
  });
});
