import { promises as fs } from 'fs';

export async function readJsonFile(fileName: string): Promise<unknown> {
  const content = await fs.readFile(fileName, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new Error(`${fileName} is not valid JSON`, { cause: err });
  }
}

export async function fileExists(fileName: string): Promise<boolean> {
  try {
    return (await fs.stat(fileName)).isFile();
  } catch {
    return false;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
