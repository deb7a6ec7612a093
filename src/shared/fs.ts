import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { CliUsageError } from "./cli-errors";

export function assertFileExists(filePath: string, label: string): void {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new CliUsageError(`${label} not found: ${filePath}`, [
      `Verify that ${label.toLowerCase()} exists and is a regular file.`,
    ]);
  }
}

export function assertDirectoryExists(dirPath: string, label: string): void {
  if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) {
    throw new CliUsageError(`${label} not found: ${dirPath}`, [
      `Verify that ${label.toLowerCase()} exists and is a directory.`,
    ]);
  }
}

export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removePaths(paths: string[]): string[] {
  const failed: string[] = [];
  for (const targetPath of paths) {
    try {
      fs.rmSync(targetPath, { recursive: true, force: true });
    } catch {
      failed.push(targetPath);
    }
  }
  return failed;
}
