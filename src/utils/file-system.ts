/**
 * File system operations - reading, writing, walking and removal.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file as raw bytes.
 */
export async function readFileBuffer(filePath: string): Promise<Buffer> {
  return fs.promises.readFile(filePath);
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if anything (including a dangling symlink) exists at a path.
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.lstat(filePath);
    return true;
  } catch { /* nothing at path */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Check if a directory has no entries.
 * Throws when the directory cannot be read.
 */
export async function isDirEmpty(dirPath: string): Promise<boolean> {
  const entries = await fs.promises.readdir(dirPath);
  return entries.length === 0;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Remove a file or directory tree. Missing paths are ignored.
 */
export async function removePath(targetPath: string): Promise<void> {
  await fs.promises.rm(targetPath, { recursive: true, force: true });
}

/**
 * Check whether the current process may write into a directory.
 */
export async function isWritable(dirPath: string): Promise<boolean> {
  try {
    await fs.promises.access(dirPath, fs.constants.W_OK);
    return true;
  } catch { /* not writable or missing */ }
  return false;
}

/** One entry of a directory tree, relative to the walked root. */
export interface TreeEntry {
  /** POSIX-style path relative to the root */
  relativePath: string;
  type: 'file' | 'directory' | 'symlink';
}

/**
 * Walk a directory tree without following symlinks.
 * Entries matching `ignore` are never enumerated (nor anything below them).
 * Results are sorted by path, so parents precede their children.
 */
export async function walkTree(root: string, ignore: string[] = []): Promise<TreeEntry[]> {
  const entries = await fg('**', {
    cwd: root,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    objectMode: true,
    ignore,
  });

  const result: TreeEntry[] = [];
  for (const entry of entries) {
    const { dirent } = entry;
    if (dirent.isSymbolicLink()) {
      result.push({ relativePath: entry.path, type: 'symlink' });
    } else if (dirent.isDirectory()) {
      result.push({ relativePath: entry.path, type: 'directory' });
    } else if (dirent.isFile()) {
      result.push({ relativePath: entry.path, type: 'file' });
    }
  }

  return result.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}

/**
 * Check that a relative path stays inside its root: not absolute and
 * without `..` segments.
 */
export function isContainedRelativePath(relativePath: string): boolean {
  if (relativePath.length === 0) return false;
  if (path.isAbsolute(relativePath) || /^[a-zA-Z]:[\\/]/.test(relativePath)) return false;
  return !relativePath.split(/[\\/]+/).some((segment) => segment === '..');
}
