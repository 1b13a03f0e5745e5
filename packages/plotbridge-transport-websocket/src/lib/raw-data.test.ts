import { describe, it, expect } from '@effect/vitest';
import { rawDataToText } from './raw-data';

describe('rawDataToText', () => {
  it('decodes a buffer', () => {
    expect(rawDataToText(Buffer.from('héllo', 'utf8'))).toBe('héllo');
  });

  it('joins fragmented buffers before decoding', () => {
    const bytes = Buffer.from('héllo', 'utf8');
    expect(rawDataToText([bytes.subarray(0, 2), bytes.subarray(2)])).toBe('héllo');
  });

  it('decodes an ArrayBuffer', () => {
    const text = '{"a":1}';
    const buffer = new ArrayBuffer(text.length);
    new Uint8Array(buffer).set(Buffer.from(text, 'utf8'));
    expect(rawDataToText(buffer)).toBe('{"a":1}');
  });
});
