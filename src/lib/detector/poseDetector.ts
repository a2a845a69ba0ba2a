import { z } from 'zod';
import { DetectorError, errorMessage } from '@/lib/errors';
import type { DecodedFrame } from '@/lib/frames/decodeFrame';
import {
  POSE_LANDMARK_NAMES,
  type PoseLandmark,
  type PoseLandmarkName,
  type PoseLandmarks,
} from '@/lib/posture/types';

/**
 * Turns a decoded frame into normalized body landmarks.
 * Resolves `null` when nobody is in the frame.
 */
export interface PoseDetector {
  detect(frame: DecodedFrame): Promise<PoseLandmarks | null>;
}

const landmarkSchema = z.object({
  name: z.enum(POSE_LANDMARK_NAMES),
  x: z.number(),
  y: z.number(),
  z: z.number().nullish(),
  visibility: z.number().nullish(),
});

export const detectorResponseSchema = z.object({
  landmarks: z.array(landmarkSchema).nullable(),
});

export type DetectorResponse = z.infer<typeof detectorResponseSchema>;

export const toPoseLandmarks = (
  entries: DetectorResponse['landmarks'],
): PoseLandmarks | null => {
  if (!entries || entries.length === 0) {
    return null;
  }

  const byName = new Map<PoseLandmarkName, PoseLandmark>(
    entries.map(({ name, ...point }): [PoseLandmarkName, PoseLandmark] => [name, point]),
  );

  const nose = byName.get('nose');
  const leftShoulder = byName.get('leftShoulder');
  const rightShoulder = byName.get('rightShoulder');
  const leftHip = byName.get('leftHip');
  const rightHip = byName.get('rightHip');

  if (!nose || !leftShoulder || !rightShoulder || !leftHip || !rightHip) {
    return null;
  }

  const landmarks: PoseLandmarks = { nose, leftShoulder, rightShoulder, leftHip, rightHip };
  for (const [name, point] of byName) {
    landmarks[name] = point;
  }
  return landmarks;
};

export interface HttpPoseDetectorOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

/** Client for a keypoint detection service reachable over HTTP. */
export class HttpPoseDetector implements PoseDetector {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor({ baseUrl, fetchImpl = fetch }: HttpPoseDetectorOptions) {
    this.endpoint = `${baseUrl.replace(/\/+$/, '')}/detect`;
    this.fetchImpl = fetchImpl;
  }

  async detect(frame: DecodedFrame): Promise<PoseLandmarks | null> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': `image/${frame.format}`,
          'X-Frame-Width': String(frame.width),
          'X-Frame-Height': String(frame.height),
        },
        body: new Uint8Array(frame.data),
      });
    } catch (error) {
      throw new DetectorError(errorMessage(error));
    }

    if (!res.ok) {
      throw new DetectorError(`detector responded with ${res.status}`);
    }

    const parsed = detectorResponseSchema.safeParse(await res.json().catch(() => null));
    if (!parsed.success) {
      throw new DetectorError('detector returned an invalid payload');
    }

    return toPoseLandmarks(parsed.data.landmarks);
  }
}
