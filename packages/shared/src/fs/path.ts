import path from 'node:path';

/**
 * Returns true when `candidate` is `parent` itself or lies beneath it.
 */
export function isWithin(parent: string, candidate: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(candidate));
  if (rel === '') return true;
  const escapes = rel === '..' || rel.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(rel);
}
