export class PostureServiceError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Frame bytes could not be decoded into an image. */
export class InputDecodeError extends PostureServiceError {
  constructor(message = 'Invalid image format or corrupted image') {
    super(message, 400);
  }
}

export class UnknownSessionError extends PostureServiceError {
  readonly sessionId: string;

  constructor(sessionId: string, hint = '') {
    super(`Session ${sessionId} not found${hint ? `. ${hint}` : ''}`, 404);
    this.sessionId = sessionId;
  }
}

export class SessionAlreadyEndedError extends PostureServiceError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} has already ended`, 409);
    this.sessionId = sessionId;
  }
}

/** The keypoint detector was unreachable or answered with something unusable. */
export class DetectorError extends PostureServiceError {
  constructor(message: string) {
    super(`Error in pose estimation: ${message}`, 502);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
