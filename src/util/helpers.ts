import fs from 'fs/promises';
import path from 'path';

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Writes `data` to a temp file beside `filePath` and renames it over the target, so readers see the old or the new file, never a partial one.
 */
export const writeFileAtomic = async (filePath: string, data: string): Promise<void> => {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(tmpPath, data, 'utf-8');
  await fs.rename(tmpPath, filePath); // Atomic swap
};

// undefined when the file does not exist
export const readFileIfExists = async (filePath: string): Promise<string | undefined> => {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }
    throw err;
  }
};

export const pad2 = (value: number) => value.toString().padStart(2, '0');
