import fs from 'node:fs';

/**
 * Size in bytes of a media file. Missing files report 0; other stat
 * failures propagate so the caller can log them.
 */
export const statFileSize = (filePath: string): number => {
  if (!fs.existsSync(filePath)) {
    return 0;
  }

  return fs.statSync(filePath).size;
};

export default statFileSize;
