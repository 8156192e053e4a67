import multer from 'multer';
import path from 'path';
import { BadRequestError } from './error-handler';

export interface UploadOptions {
  directory: string;
  maxFileSize: number;
}

/** Mail clients store mailboxes as `.mbox` or as bare files with no extension */
export function isMboxFilename(filename: string): boolean {
  const ext = path.extname(filename).toLowerCase();
  return ext === '' || ext === '.mbox';
}

export function createUpload({ directory, maxFileSize }: UploadOptions): multer.Multer {
  const storage = multer.diskStorage({
    destination: directory,
    filename: (_req, file, cb) => {
      const uniqueName = `mbox-${Date.now()}-${Math.round(Math.random() * 1e9)}${path.extname(file.originalname)}`;
      cb(null, uniqueName);
    },
  });

  return multer({
    storage,
    limits: { fileSize: maxFileSize },
    fileFilter: (_req, file, cb) => {
      if (isMboxFilename(file.originalname)) {
        cb(null, true);
      } else {
        cb(new BadRequestError('Only .mbox files (or files without an extension) are accepted'));
      }
    },
  });
}
