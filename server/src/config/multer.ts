import multer from 'multer';
import { BadRequestError } from '../middleware/error-handler';
import { config } from './index';

const ACCEPTED_TYPES = new Set([
  'image/png',
  'image/jpeg',
  'image/webp',
  'image/gif',
  'image/bmp',
  'image/tiff',
  'image/x-tga',
]);

/**
 * Uploads stay in memory; sharp decodes straight from the buffer
 */
export const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.maxUploadMb * 1024 * 1024,
    files: 1,
  },
  fileFilter: (_req, file, cb) => {
    if (ACCEPTED_TYPES.has(file.mimetype)) {
      cb(null, true);
    } else {
      cb(new BadRequestError(`Unsupported image type "${file.mimetype}"`));
    }
  },
});
