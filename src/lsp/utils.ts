import { isAbsolute, relative, resolve, sep } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

/**
 * 确保为规范化的 file:// URI
 * @param u 文件路径或 URI
 */
export function ensureUri(u: string): string {
  if (u.startsWith('file://')) return pathToFileURL(fileURLToPath(u)).href;
  return pathToFileURL(resolve(u)).href;
}

/**
 * URI 或路径转为绝对文件系统路径
 * @param u file:// URI 或文件路径
 * @returns 文件系统路径，非 file:// 的 URI 返回 null
 */
export function uriToFsPath(u: string): string | null {
  if (u.startsWith('file://')) {
    try {
      return fileURLToPath(u);
    } catch {
      return null;
    }
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(u)) return null;
  return resolve(u);
}

/**
 * 判断 candidate 是否等于 parent 或位于其下（纯路径比较，不访问磁盘）
 */
export function isWithinPath(candidate: string, parent: string): boolean {
  const rel = relative(parent, candidate);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

