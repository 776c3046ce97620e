import { ZodError } from 'zod';

export class AlbumNotFoundError extends Error {
  readonly code = 'ALBUM_NOT_FOUND';

  constructor(albumId: string) {
    super(`Album ${albumId} was not found`);
    this.name = 'AlbumNotFoundError';
  }
}

export interface ErrorResponse {
  statusCode: number;
  message: string;
  details?: unknown;
}

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof AlbumNotFoundError) {
    return {
      statusCode: 404,
      message: error.message
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  return {
    statusCode: 500,
    message: 'Unexpected error'
  };
};
