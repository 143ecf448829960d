/**
 * Local Storage Service - keeps uploaded files under the upload directory
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger, errorMeta } from '../../utils/logging';

export interface StoredFileInput {
  buffer: Buffer;
  originalName: string;
}

export interface AttachmentStorage {
  /**
   * @returns the stored path relative to the upload directory
   */
  save(file: StoredFileInput): Promise<string>;
  /**
   * Best effort; a missing file is not an error
   */
  remove(relativePath: string): Promise<void>;
}

export const ISSUE_FILES_DIR = 'issue_files';

/**
 * Generate unique filename
 */
const generateFileName = (originalName: string): string => {
  const ext = path.extname(originalName).toLowerCase();
  const baseName = path
    .basename(originalName, path.extname(originalName))
    .replace(/[^a-zA-Z0-9_-]+/g, '-')
    .slice(0, 60);
  return `${baseName || 'file'}-${Date.now()}-${uuidv4().substring(0, 8)}${ext}`;
};

export class LocalAttachmentStorage implements AttachmentStorage {
  constructor(
    private readonly uploadDir: string,
    private readonly subDir: string = ISSUE_FILES_DIR
  ) {}

  async save(file: StoredFileInput): Promise<string> {
    const targetDir = path.join(this.uploadDir, this.subDir);
    await fs.mkdir(targetDir, { recursive: true });

    const fileName = generateFileName(file.originalName);
    await fs.writeFile(path.join(targetDir, fileName), file.buffer);

    // Stored with forward slashes so the value doubles as the /uploads URL path
    return `${this.subDir}/${fileName}`;
  }

  async remove(relativePath: string): Promise<void> {
    const filePath = this.resolve(relativePath);
    if (!filePath) {
      logger.warn('[Storage] Refusing to delete outside the upload directory', { relativePath });
      return;
    }

    try {
      await fs.unlink(filePath);
    } catch (error) {
      logger.warn('[Storage] Could not delete file', { relativePath, ...errorMeta(error) });
    }
  }

  /**
   * Absolute path for a stored file, or null when the path escapes the upload directory
   */
  resolve(relativePath: string): string | null {
    const root = path.resolve(this.uploadDir);
    const filePath = path.resolve(root, relativePath);
    return filePath.startsWith(root + path.sep) ? filePath : null;
  }
}
