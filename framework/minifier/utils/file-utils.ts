// ============================================================================
// File System Utilities
// ============================================================================

import fs from 'fs';

/**
 * Safely read a file, returning null on error.
 * A missing template is minified as empty content rather than failing.
 */
export const safeReadFile = async (filePath: string): Promise<string | null> => {
  try {
    return await fs.promises.readFile(filePath, 'utf8');
  } catch {
    return null;
  }
};

/**
 * Check if a file or directory exists
 */
export const pathExists = async (target: string): Promise<boolean> => {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
};

