// src/utils/file-helpers.ts
import * as fs from 'fs';
import * as path from 'path';

export class FileHelpers {
  /**
   * Ensure directory exists
   */
  static ensureDirectory(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
  }

  /**
   * Read and parse a JSON file; the caller validates the shape
   */
  static readJsonFile(filePath: string): unknown {
    const content = fs.readFileSync(filePath, 'utf-8');
    return JSON.parse(content);
  }

  /**
   * Names of the immediate subdirectories, sorted
   */
  static listSubdirectories(dirPath: string): string[] {
    return fs.readdirSync(dirPath, { withFileTypes: true })
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  }

  static countSubdirectories(dirPath: string): number {
    if (!fs.existsSync(dirPath)) return 0;
    return FileHelpers.listSubdirectories(dirPath).length;
  }

  /**
   * All files with an .xml extension below dirPath, as '/'-separated paths
   * relative to it, sorted lexicographically
   */
  static listXmlFiles(dirPath: string): string[] {
    const found: string[] = [];

    const walk = (current: string, prefix: string[]): void => {
      for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
        if (entry.isDirectory()) {
          walk(path.join(current, entry.name), [...prefix, entry.name]);
        } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.xml')) {
          found.push([...prefix, entry.name].join('/'));
        }
      }
    };

    walk(dirPath, []);
    return found.sort();
  }
}
