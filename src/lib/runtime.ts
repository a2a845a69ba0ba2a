import { HttpPoseDetector } from '@/lib/detector/poseDetector';
import { getServerEnv } from '@/lib/env/server';
import { PostureSessionService } from '@/lib/session/service';
import { createSessionStore } from '@/lib/store';

// Route handlers are bundled by Next separately from server.ts, so the one
// service instance is published on globalThis.
declare global {
  // eslint-disable-next-line no-var
  var postureSessionService: PostureSessionService | undefined;
}

export function createPostureSessionService(): PostureSessionService {
  const env = getServerEnv();
  return new PostureSessionService({
    store: createSessionStore(env),
    detector: new HttpPoseDetector({ baseUrl: env.POSE_DETECTOR_URL }),
    decode: { minWidth: env.MIN_FRAME_WIDTH, minHeight: env.MIN_FRAME_HEIGHT },
  });
}

export function registerPostureSessionService(service: PostureSessionService) {
  globalThis.postureSessionService = service;
}

export function getPostureSessionService(): PostureSessionService {
  const existing = globalThis.postureSessionService;
  if (existing) {
    return existing;
  }
  const service = createPostureSessionService();
  registerPostureSessionService(service);
  return service;
}
