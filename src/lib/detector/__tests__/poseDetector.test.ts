import { describe, it, expect, vi } from 'vitest';

import { HttpPoseDetector, toPoseLandmarks } from '../poseDetector';
import { DetectorError } from '@/lib/errors';
import type { DecodedFrame } from '@/lib/frames/decodeFrame';

const FRAME: DecodedFrame = {
  data: Buffer.from([1, 2, 3]),
  width: 640,
  height: 480,
  format: 'jpeg',
};

const BODY = [
  { name: 'nose', x: 0.5, y: 0.2 },
  { name: 'leftShoulder', x: 0.4, y: 0.5, visibility: 0.9 },
  { name: 'rightShoulder', x: 0.6, y: 0.5 },
  { name: 'leftHip', x: 0.4, y: 0.9 },
  { name: 'rightHip', x: 0.6, y: 0.9 },
  { name: 'leftEar', x: 0.45, y: 0.18, z: -0.1 },
] as const;

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

describe('toPoseLandmarks', () => {
  it('indexes landmarks by name', () => {
    const landmarks = toPoseLandmarks([...BODY]);

    expect(landmarks?.nose).toEqual({ x: 0.5, y: 0.2 });
    expect(landmarks?.leftShoulder).toEqual({ x: 0.4, y: 0.5, visibility: 0.9 });
    expect(landmarks?.leftEar).toEqual({ x: 0.45, y: 0.18, z: -0.1 });
  });

  it('treats a missing torso landmark as no detection', () => {
    expect(toPoseLandmarks(BODY.filter((landmark) => landmark.name !== 'rightHip'))).toBeNull();
  });

  it('treats null or empty lists as no detection', () => {
    expect(toPoseLandmarks(null)).toBeNull();
    expect(toPoseLandmarks([])).toBeNull();
  });
});

describe('HttpPoseDetector', () => {
  it('posts the frame bytes to the detect endpoint', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ landmarks: BODY }));
    const detector = new HttpPoseDetector({
      baseUrl: 'http://detector.local/',
      fetchImpl: fetchMock as unknown as typeof fetch,
    });

    const landmarks = await detector.detect(FRAME);

    expect(landmarks?.rightHip).toEqual({ x: 0.6, y: 0.9 });
    expect(fetchMock).toHaveBeenCalledWith(
      'http://detector.local/detect',
      expect.objectContaining({
        method: 'POST',
        headers: {
          'Content-Type': 'image/jpeg',
          'X-Frame-Width': '640',
          'X-Frame-Height': '480',
        },
      }),
    );
  });

  it('resolves null when the service finds nobody', async () => {
    const detector = new HttpPoseDetector({
      baseUrl: 'http://detector.local',
      fetchImpl: (async () => jsonResponse({ landmarks: null })) as unknown as typeof fetch,
    });

    await expect(detector.detect(FRAME)).resolves.toBeNull();
  });

  it('wraps non-2xx responses', async () => {
    const detector = new HttpPoseDetector({
      baseUrl: 'http://detector.local',
      fetchImpl: (async () => jsonResponse({ error: 'boom' }, 503)) as unknown as typeof fetch,
    });

    await expect(detector.detect(FRAME)).rejects.toThrow(
      new DetectorError('detector responded with 503'),
    );
  });

  it('rejects payloads that do not match the landmark schema', async () => {
    const detector = new HttpPoseDetector({
      baseUrl: 'http://detector.local',
      fetchImpl: (async () => jsonResponse({ landmarks: [{ name: 'tail', x: 1, y: 1 }] })) as unknown as typeof fetch,
    });

    await expect(detector.detect(FRAME)).rejects.toThrow(
      'Error in pose estimation: detector returned an invalid payload',
    );
  });

  it('wraps network failures', async () => {
    const detector = new HttpPoseDetector({
      baseUrl: 'http://detector.local',
      fetchImpl: (async () => {
        throw new Error('ECONNREFUSED');
      }) as unknown as typeof fetch,
    });

    await expect(detector.detect(FRAME)).rejects.toBeInstanceOf(DetectorError);
  });
});
