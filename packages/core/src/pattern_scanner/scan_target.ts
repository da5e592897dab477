import * as fs from "fs/promises";
import { constants } from "fs";
import * as path from "path";
import { FsFileLister } from "../file_lister";
import type { FileLister } from "../file_lister";
import { ScanTargetError } from "./pattern_scanner.errors";

/**
 * Validates a directory on disk and returns a lister rooted at it.
 * @throws ScanTargetError if the path is missing, not a directory or unreadable
 */
export async function openFsTarget(rootPath: string): Promise<FileLister> {
  const resolved = path.resolve(rootPath);
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(resolved)).isDirectory();
  } catch {
    throw new ScanTargetError("path does not exist", rootPath);
  }
  if (!isDirectory) {
    throw new ScanTargetError("not a directory", rootPath);
  }
  try {
    await fs.access(resolved, constants.R_OK | constants.X_OK);
  } catch {
    throw new ScanTargetError("directory is not readable", rootPath);
  }
  return new FsFileLister({ cwd: resolved });
}
