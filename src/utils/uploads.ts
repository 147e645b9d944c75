import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { Request } from 'express';
import multer from 'multer';
import config from '../config';

export const RESUME_EXTENSIONS = ['pdf', 'docx', 'doc', 'jpg', 'jpeg'];
export const PHOTO_EXTENSIONS = ['jpg', 'jpeg', 'png'];
export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024; // 5MB

export const resumeDir = () => path.join(config.uploadDir, 'resumes');
export const photoDir = () => path.join(config.uploadDir, 'profile_photos');

export class UploadRejectedError extends Error {}

export const fileExtension = (filename: string) => {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
};

export const secureFilename = (filename: string) =>
  path
    .basename(filename.replace(/\\/g, '/'))
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+/, '');

// Multer storage: resumes and photos go to their own folders under unique names
const storage = multer.diskStorage({
  destination: (_req, file, cb) => {
    const dir = file.fieldname === 'resume' ? resumeDir() : photoDir();
    fs.mkdir(dir, { recursive: true }, (error) => cb(error, dir));
  },
  filename: (_req, file, cb) => {
    cb(null, `${crypto.randomBytes(16).toString('hex')}.${fileExtension(file.originalname)}`);
  },
});

const fileFilter: multer.Options['fileFilter'] = (_req, file, cb) => {
  const extension = fileExtension(file.originalname);

  if (file.fieldname === 'resume' && !RESUME_EXTENSIONS.includes(extension)) {
    return cb(new UploadRejectedError('Only PDF, Word (doc/docx), and JPEG files are allowed for resume upload.'));
  }
  if (file.fieldname === 'profile_photo' && !PHOTO_EXTENSIONS.includes(extension)) {
    return cb(new UploadRejectedError('Only JPG, JPEG, and PNG files are allowed for profile photos.'));
  }
  cb(null, true);
};

const upload = multer({
  storage,
  fileFilter,
  limits: { fileSize: MAX_UPLOAD_BYTES },
});

export const studentProfileUpload = upload.fields([
  { name: 'resume', maxCount: 1 },
  { name: 'profile_photo', maxCount: 1 },
]);

export const recruiterProfileUpload = upload.fields([{ name: 'profile_photo', maxCount: 1 }]);

export const uploadedFile = (req: Request, field: string): Express.Multer.File | undefined => {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
};

const removeFile = async (filePath: string) => {
  try {
    await fs.promises.unlink(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
    console.error(`Failed to remove file ${filePath}:`, error);
  }
};

// Used when a request fails after multer already wrote its files.
export const removeUploadedFiles = async (req: Request) => {
  const files = req.files;
  if (!files) return;
  const list = Array.isArray(files) ? files : Object.values(files).flat();
  await Promise.all(list.map((file) => removeFile(file.path)));
};

export const removeStoredFile = async (dir: string, filename: string | null) => {
  if (!filename) return;
  await removeFile(path.join(dir, path.basename(filename)));
};

export const resumeMimeType = (extension: string) => {
  switch (extension) {
    case 'pdf':
      return 'application/pdf';
    case 'doc':
      return 'application/msword';
    case 'docx':
      return 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
    case 'jpg':
    case 'jpeg':
      return 'image/jpeg';
    default:
      return 'application/octet-stream';
  }
};

export const fileExists = async (filePath: string) => {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
};
