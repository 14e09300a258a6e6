export type PictureErrorCode =
  | 'io'
  | 'database'
  | 'invalid_format'
  | 'too_large'
  | 'dimensions_exceeded'
  | 'not_found';

export class PictureError extends Error {
  readonly code: PictureErrorCode;

  constructor(code: PictureErrorCode, message: string) {
    super(message);
    this.name = 'PictureError';
    this.code = code;
  }

  static io(err: unknown): PictureError {
    return new PictureError('io', `IO error: ${err instanceof Error ? err.message : String(err)}`);
  }

  static database(err: unknown): PictureError {
    return new PictureError('database', `Database error: ${err instanceof Error ? err.message : String(err)}`);
  }

  static invalidFormat(reason?: string): PictureError {
    return new PictureError('invalid_format', reason ? `Invalid image format: ${reason}` : 'Invalid image format');
  }

  static tooLarge(size: number, maxSize: number): PictureError {
    return new PictureError('too_large', `Image too large: ${size} bytes (max: ${maxSize} bytes)`);
  }

  static dimensionsExceeded(width: number, height: number, maxSize: number): PictureError {
    return new PictureError(
      'dimensions_exceeded',
      `Image dimensions ${width}x${height} exceed the maximum of ${maxSize} pixels`
    );
  }

  static notFound(pictureId?: number): PictureError {
    return new PictureError('not_found', pictureId === undefined ? 'Picture not found' : `Picture ${pictureId} not found`);
  }
}
