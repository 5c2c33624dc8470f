import fs from 'fs-extra';
import path from 'node:path';
import crypto from 'node:crypto';

export const tempPath = (dir: string, filename: string): string => path.join(dir, `${filename}.part`);

/**
 * Writes through a uniquely named `.part` file in the target directory and
 * moves it over `filePath`, so readers never observe a half-written image.
 */
export const writeFileAtomic = async (filePath: string, data: Buffer): Promise<void> => {
  const dir = path.dirname(filePath);
  await fs.ensureDir(dir);
  const suffix = crypto.randomBytes(4).toString('hex');
  const temp = tempPath(dir, `${path.basename(filePath)}.${suffix}`);
  try {
    await fs.writeFile(temp, data);
    await fs.move(temp, filePath, { overwrite: true });
  } catch (error) {
    await fs.remove(temp);
    throw error;
  }
};
