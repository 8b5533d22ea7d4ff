import express, { Request } from 'express';
import multer from 'multer';
import { env } from '../config';

const maxBytes = env.UPLOAD_MAX_MB * 1024 * 1024;

const isMultipart = (req: Pick<Request, 'headers'>): boolean =>
  (req.headers['content-type'] ?? '').toLowerCase().includes('multipart/form-data');

/**
 * Multipart uploads are buffered in memory; any field name is accepted and
 * the first file part is used.
 */
export const multipartUpload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: maxBytes, files: 1 },
}).any();

/**
 * Any non-multipart body is taken as the raw workbook bytes.
 */
export const rawUpload = express.raw({
  type: (req) => !isMultipart(req),
  limit: maxBytes,
});

/**
 * Bytes and client file name of the upload, whichever way it was sent.
 */
export const getUploadedFile = (req: Request): { bytes: Buffer; originalName?: string } | null => {
  const files = req.files;
  if (Array.isArray(files) && files.length > 0) {
    return { bytes: files[0].buffer, originalName: files[0].originalname || undefined };
  }
  if (Buffer.isBuffer(req.body) && req.body.length > 0) {
    return { bytes: req.body };
  }
  return null;
};
