import fs from 'fs';
import path from 'path';

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

export function readVersionFromPackageJson(startDir: string = __dirname): string {
  const pkgPath = findPackageJson(startDir);
  if (!pkgPath) return '0.0.0';
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}
