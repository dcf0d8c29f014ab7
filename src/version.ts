import { readdir, readFile } from 'fs/promises';
import { join } from 'path';

const MANIFEST_FILES = ['__manifest__.py', '__openerp__.py'];
const MAX_DEPTH = 4;

// Module versions are `<series>.<x>.<y>.<z>`, e.g. `17.0.1.0.0` or `saas~17.2.1.0.0`
const MANIFEST_VERSION = /["']version["']\s*:\s*["']((?:saas~)?\d+\.\d+)\.\d+\.\d+\.\d+["']/;

/**
 * Extracts the Odoo series from the content of a module manifest.
 */
export function versionFromManifest(content: string): string | null {
  return MANIFEST_VERSION.exec(content)?.[1] ?? null;
}

function compareSeries(a: string, b: string): number {
  const parse = (series: string) => series.replace('saas~', '').split('.').map(Number);
  const [aMajor, aMinor] = parse(a);
  const [bMajor, bMinor] = parse(b);
  return aMajor - bMajor || aMinor - bMinor;
}

/**
 * Determines the Odoo version targeted by the addons of a repository.
 *
 * Every module manifest up to four directories deep is read; the series most
 * modules declare wins, the highest one on a tie.
 *
 * @returns The series, e.g. `17.0`, or `null` when no manifest declares one
 */
export async function versionFromAddons(repositoryPath: string): Promise<string | null> {
  const counts = new Map<string, number>();

  async function scanDir(dir: string, depth: number): Promise<void> {
    if (depth > MAX_DEPTH) return;

    let entries;
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch {
      return; // Skip directories we cannot read
    }

    const manifest = entries.find(e => e.isFile() && MANIFEST_FILES.includes(e.name));
    if (manifest) {
      let content: string;
      try {
        content = await readFile(join(dir, manifest.name), 'utf8');
      } catch {
        return; // Unreadable manifests do not vote
      }

      const version = versionFromManifest(content);
      if (version) {
        counts.set(version, (counts.get(version) ?? 0) + 1);
      }
      return; // Modules do not nest
    }

    await Promise.all(
      entries
        .filter(e => e.isDirectory() && !e.name.startsWith('.') && e.name !== 'node_modules')
        .map(e => scanDir(join(dir, e.name), depth + 1))
    );
  }

  await scanDir(repositoryPath, 1);

  let best: string | null = null;
  let bestCount = 0;
  for (const [version, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && compareSeries(version, best) > 0)) {
      best = version;
      bestCount = count;
    }
  }
  return best;
}
