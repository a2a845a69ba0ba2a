import { describe, it, expect } from 'vitest';

import { analyzeFrame, analyzeLandmarks, NO_DETECTION } from '../analyzer';
import { InputDecodeError } from '@/lib/errors';
import {
  createPng,
  fakeDetector,
  FRAME_640x480,
  SLUMPED_LANDMARKS,
  UPRIGHT_LANDMARKS,
} from '@/lib/__tests__/fixtures';

describe('analyzeLandmarks', () => {
  it('returns the no-detection variant when there are no landmarks', () => {
    const analysis = analyzeLandmarks(null, FRAME_640x480);

    expect(analysis).toBe(NO_DETECTION);
    expect(analysis.label).toBe('No person detected');
    expect(analysis.score).toBe(0);
    expect(analysis.isGoodPosture).toBe(false);
  });

  it('classifies and scores an upright subject', () => {
    const analysis = analyzeLandmarks(UPRIGHT_LANDMARKS, FRAME_640x480);

    expect(analysis.kind).toBe('detected');
    if (analysis.kind !== 'detected') return;
    expect(analysis.label).toBe('Good Posture');
    expect(analysis.score).toBe(98);
    expect(analysis.isGoodPosture).toBe(true);
    expect(analysis.metrics.neckAngle).toBe(180);
  });

  it('dumps landmarks with their body-model index', () => {
    const analysis = analyzeLandmarks(UPRIGHT_LANDMARKS, FRAME_640x480);
    if (analysis.kind !== 'detected') throw new Error('expected a detection');

    expect(analysis.landmarks.map((landmark) => [landmark.index, landmark.name])).toEqual([
      [0, 'nose'],
      [11, 'leftShoulder'],
      [12, 'rightShoulder'],
      [23, 'leftHip'],
      [24, 'rightHip'],
    ]);
    expect(analysis.landmarks[0]).toEqual({
      index: 0,
      name: 'nose',
      x: 0.5,
      y: 0.125,
      z: -0.2,
      visibility: 0.99,
    });
    expect(analysis.landmarks[3]).toMatchObject({ z: null, visibility: null });
  });

  it('scores the slump independently of its label', () => {
    const analysis = analyzeLandmarks(SLUMPED_LANDMARKS, FRAME_640x480);

    expect(analysis.label).toBe('Severely Slouched');
    expect(analysis.score).toBe(30);
  });
});

describe('analyzeFrame', () => {
  it('passes the decoded frame dimensions to the detector', async () => {
    const png = await createPng(640, 480);
    const detector = fakeDetector();

    const analysis = await analyzeFrame(png.toString('base64'), detector);

    expect(detector.detect).toHaveBeenCalledTimes(1);
    expect(detector.detect.mock.calls[0]?.[0]).toMatchObject({ width: 640, height: 480, format: 'png' });
    expect(analysis.label).toBe('Good Posture');
  });

  it('reports no detection when the detector finds nobody', async () => {
    const png = await createPng(320, 240);

    const analysis = await analyzeFrame(png, fakeDetector(null));

    expect(analysis).toBe(NO_DETECTION);
  });

  it('rejects undecodable frames before calling the detector', async () => {
    const detector = fakeDetector();

    await expect(analyzeFrame('%%% not base64 %%%', detector)).rejects.toBeInstanceOf(InputDecodeError);
    expect(detector.detect).not.toHaveBeenCalled();
  });
});
