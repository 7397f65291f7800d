import * as path from 'path';
import * as fs from 'fs-extra';
import type { Dirent } from 'fs';
import { BaseError } from '../errors/base.error';
import { FileNotFoundError, FileSystemError } from '../errors/filesystem.error';

/**
 * Thin fs-extra wrapper so commands can be exercised against a fake file system
 */
export class FileSystemService {
  public async pathExists(targetPath: string): Promise<boolean> {
    return await fs.pathExists(targetPath);
  }

  public async isFile(targetPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(targetPath);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  public async isDirectory(targetPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(targetPath);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  public async readFile(filePath: string): Promise<string> {
    if (!(await fs.pathExists(filePath))) {
      throw new FileNotFoundError(`File not found: ${filePath}`);
    }

    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new FileSystemError(`Failed to read file: ${filePath}`, BaseError.messageOf(error));
    }
  }

  /**
   * Write a UTF-8 file, creating parent directories as needed
   */
  public async writeFile(filePath: string, content: string, mode?: number): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeFile(filePath, content, 'utf8');
      if (mode !== undefined) {
        await fs.chmod(filePath, mode);
      }
    } catch (error) {
      throw new FileSystemError(`Failed to write file: ${filePath}`, BaseError.messageOf(error));
    }
  }

  public async remove(targetPath: string): Promise<void> {
    try {
      await fs.remove(targetPath);
    } catch (error) {
      throw new FileSystemError(`Failed to remove: ${targetPath}`, BaseError.messageOf(error));
    }
  }

  /**
   * File size in bytes
   */
  public async getSize(filePath: string): Promise<number> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error) {
      throw new FileSystemError(`Failed to stat file: ${filePath}`, BaseError.messageOf(error));
    }
  }

  /**
   * Recursively collect files with the given extension, sorted by path.
   * Hidden directories are skipped.
   */
  public async findFiles(directory: string, extension: string): Promise<string[]> {
    const found: string[] = [];
    const pending = [directory];

    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined) {
        break;
      }

      let entries: Dirent[];
      try {
        entries = await fs.readdir(current, { withFileTypes: true });
      } catch (error) {
        throw new FileSystemError(`Failed to read directory: ${current}`, BaseError.messageOf(error));
      }

      for (const entry of entries) {
        const entryPath = path.join(current, entry.name);
        if (entry.isDirectory()) {
          if (!entry.name.startsWith('.')) {
            pending.push(entryPath);
          }
        } else if (entry.isFile() && path.extname(entry.name) === extension) {
          found.push(entryPath);
        }
      }
    }

    return found.sort();
  }
}
