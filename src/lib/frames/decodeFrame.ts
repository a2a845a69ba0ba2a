import sharp from 'sharp';
import { InputDecodeError } from '@/lib/errors';
import type { FrameDimensions } from '@/lib/posture/types';

export interface DecodedFrame extends FrameDimensions {
  data: Buffer;
  format: string;
}

export interface DecodeFrameOptions {
  minWidth?: number;
  minHeight?: number;
}

const DEFAULT_OPTIONS: Required<DecodeFrameOptions> = {
  minWidth: 100,
  minHeight: 100,
};

const DATA_URI_PREFIX = /^data:image\/[a-z0-9.+-]+;base64,/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/** Strict base64 → bytes. Accepts an optional `data:image/*;base64,` prefix. */
export const decodeBase64Frame = (payload: string): Buffer => {
  const body = payload.replace(DATA_URI_PREFIX, '').replace(/\s+/g, '');

  if (body.length === 0 || body.length % 4 !== 0 || !BASE64_PATTERN.test(body)) {
    throw new InputDecodeError('Invalid base64 frame payload');
  }

  return Buffer.from(body, 'base64');
};

// The header alone says nothing about truncated or corrupt pixel data,
// so the whole image is decoded once.
const decodePixels = async (data: Buffer) => {
  const image = sharp(data, { failOn: 'truncated' });
  const { format } = await image.metadata();
  const { info } = await image.raw().toBuffer({ resolveWithObject: true });
  return { format, width: info.width, height: info.height };
};

export async function decodeFrame(
  input: string | Buffer,
  options: DecodeFrameOptions = {},
): Promise<DecodedFrame> {
  const { minWidth, minHeight } = { ...DEFAULT_OPTIONS, ...options };
  const data = typeof input === 'string' ? decodeBase64Frame(input) : input;

  if (data.length === 0) {
    throw new InputDecodeError();
  }

  let decoded: { format?: string; width: number; height: number };
  try {
    decoded = await decodePixels(data);
  } catch {
    throw new InputDecodeError();
  }

  const { width, height, format } = decoded;
  if (!width || !height || !format) {
    throw new InputDecodeError();
  }

  if (width < minWidth || height < minHeight) {
    throw new InputDecodeError('Image dimensions too small');
  }

  return { data, width, height, format };
}
