import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';

/**
 * Directory that receives transformed subtitle files.
 * Created on first use; every file name carries a random token so
 * concurrent transforms never collide.
 */
export class TempWorkspace {
  private dir: string;

  constructor(dir?: string) {
    this.dir = dir ?? path.join(config.tempDir, `session-${process.pid}`);
  }

  get directory(): string {
    return this.dir;
  }

  private ensureDirectory(): void {
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }

  /**
   * Reserves a fresh output path derived from a source file
   * @param sourcePath - File being transformed
   * @param tag - Short label for the transform, e.g. "shifted"
   * @param ext - Extension for the output, defaults to the source's
   */
  createFilePath(sourcePath: string, tag: string, ext?: string): string {
    this.ensureDirectory();

    const sourceExt = path.extname(sourcePath);
    const stem = path.basename(sourcePath, sourceExt);
    const uniqueId = uuidv4().slice(0, 8);

    return path.join(this.dir, `${stem}_${tag}_${uniqueId}${ext ?? sourceExt}`);
  }

  /**
   * Writes a new file, refusing to overwrite an existing one
   */
  writeFile(filePath: string, content: string): void {
    fs.writeFileSync(filePath, content, { encoding: 'utf-8', flag: 'wx' });
  }

  /**
   * Removes a partially written output, if any
   */
  discard(filePath: string): void {
    try {
      fs.rmSync(filePath, { force: true });
    } catch (error) {
      console.warn(`Could not remove partial output ${filePath}:`, error);
    }
  }

  /**
   * Deletes the whole directory. Only call once no transform is in flight.
   */
  cleanup(): void {
    fs.rmSync(this.dir, { recursive: true, force: true });
  }
}

export const tempWorkspace = new TempWorkspace();
