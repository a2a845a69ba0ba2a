import { NextResponse } from 'next/server';
import { errorMessage, InputDecodeError, PostureServiceError } from '@/lib/errors';

export function errorResponse(error: unknown, context: string) {
  if (error instanceof PostureServiceError) {
    if (!(error instanceof InputDecodeError)) {
      console.warn(`${context}:`, error.message);
    }
    return NextResponse.json({ error: error.message }, { status: error.status });
  }

  console.error(`${context}:`, error);
  return NextResponse.json(
    { error: 'Internal server error', details: errorMessage(error) },
    { status: 500 },
  );
}

/** Reads the `file` part of a multipart upload into a Buffer. */
export async function readUploadedFrame(request: Request): Promise<Buffer> {
  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    throw new InputDecodeError('Expected a multipart form upload with a file field');
  }

  const file = form.get('file');
  if (!(file instanceof Blob)) {
    throw new InputDecodeError('file is required');
  }
  return Buffer.from(await file.arrayBuffer());
}
