import { describe, it, expect } from 'vitest';

import { decodeBase64Frame, decodeFrame } from '../decodeFrame';
import { InputDecodeError } from '@/lib/errors';
import { createPng } from '@/lib/__tests__/fixtures';

describe('decodeBase64Frame', () => {
  it('decodes plain base64', () => {
    expect(decodeBase64Frame('aGVsbG8=').toString('utf8')).toBe('hello');
  });

  it('strips a data URI prefix and whitespace', () => {
    expect(decodeBase64Frame('data:image/jpeg;base64,aGVs\nbG8=').toString('utf8')).toBe('hello');
  });

  it.each(['', 'abc', 'aGVsbG8=!', '****'])('rejects %j', (payload) => {
    expect(() => decodeBase64Frame(payload)).toThrow('Invalid base64 frame payload');
  });
});

describe('decodeFrame', () => {
  it('reads dimensions and format from an encoded image', async () => {
    const png = await createPng(160, 120);

    const frame = await decodeFrame(png.toString('base64'));

    expect(frame.width).toBe(160);
    expect(frame.height).toBe(120);
    expect(frame.format).toBe('png');
    expect(frame.data.equals(png)).toBe(true);
  });

  it('accepts raw bytes', async () => {
    const png = await createPng(100, 100);

    await expect(decodeFrame(png)).resolves.toMatchObject({ width: 100, height: 100 });
  });

  it('rejects frames below the minimum size', async () => {
    const png = await createPng(99, 200);

    await expect(decodeFrame(png)).rejects.toThrow('Image dimensions too small');
  });

  it('honours custom minimum sizes', async () => {
    const png = await createPng(64, 64);

    await expect(decodeFrame(png, { minWidth: 32, minHeight: 32 })).resolves.toMatchObject({
      width: 64,
    });
  });

  it('rejects bytes that are not an image', async () => {
    const error = await decodeFrame(Buffer.from('hello world').toString('base64')).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(InputDecodeError);
    expect(error).toHaveProperty('message', 'Invalid image format or corrupted image');
    expect(error).toHaveProperty('status', 400);
  });

  it('rejects an image cut off partway through its pixel data', async () => {
    const png = await createPng(640, 480);
    const truncated = png.subarray(0, Math.floor(png.length / 2));

    await expect(decodeFrame(truncated)).rejects.toThrow(
      new InputDecodeError('Invalid image format or corrupted image'),
    );
    await expect(decodeFrame(truncated.toString('base64'))).rejects.toBeInstanceOf(
      InputDecodeError,
    );
  });

  it('rejects an empty buffer', async () => {
    await expect(decodeFrame(Buffer.alloc(0))).rejects.toBeInstanceOf(InputDecodeError);
  });
});
