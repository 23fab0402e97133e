import fs from 'fs/promises';
import { AppError } from './app-error';

export function formatFileSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(2)} ${units[unitIndex]}`;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function loadTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw AppError.fileRead(filePath, describe(error));
  }
}

export async function saveTextFile(filePath: string, contents: string): Promise<void> {
  try {
    await fs.writeFile(filePath, contents, 'utf8');
  } catch (error) {
    throw AppError.fileWrite(filePath, describe(error));
  }
}

export async function loadBinaryFile(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw AppError.fileRead(filePath, describe(error));
  }
}

export async function saveBinaryFile(filePath: string, contents: Buffer): Promise<void> {
  try {
    await fs.writeFile(filePath, contents);
  } catch (error) {
    throw AppError.fileWrite(filePath, describe(error));
  }
}
