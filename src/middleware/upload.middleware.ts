import { Request } from 'express';
import multer from 'multer';
import { ValidationError } from '../utils/errorHandler';
import { UploadedDocument } from '../utils/textParser';

// Files stay in memory; nothing uploaded is written to disk.
export function createUpload(maxUploadBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadBytes,
      files: 1
    }
  });
}

export function uploadedFile(req: Request): UploadedDocument | undefined {
  return req.file;
}

export function requireFile(req: Request, label: string): UploadedDocument {
  const file = uploadedFile(req);
  if (!file) {
    throw new ValidationError(`No file provided. Upload the ${label} in the "file" field.`);
  }
  return file;
}
