import { getOS } from '../common/os/index.ts';
import { errorMessage } from '../errors.ts';
import { logger } from '../logger.ts';
import type { Distro, PlatformInfo } from './types.ts';

export const OS_RELEASE_PATH = '/etc/os-release';

/**
 * Parses os-release content into fields, stripping optional quotes.
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const match = line.trim().match(/^([A-Z0-9_]+)=(.*)$/);
    if (!match) continue;
    const [, key, raw] = match;
    if (key === undefined || raw === undefined) continue;
    fields[key] = raw.replace(/^["']|["']$/g, '');
  }
  return fields;
}

export function classifyDistro(fields: Record<string, string>): Distro {
  const ids = [fields.ID ?? '', ...(fields.ID_LIKE ?? '').split(/\s+/)];
  return ids.includes('debian') ? 'debian' : 'unknown';
}

/**
 * Identifies the host. Never fails: a missing or unreadable os-release means an unknown distro.
 */
export function detectPlatform(): PlatformInfo {
  const os = getOS();
  const osFamily = os.host.platform();

  let distro: Distro = 'unknown';
  if (osFamily === 'linux' && os.fs.exists(OS_RELEASE_PATH)) {
    try {
      distro = classifyDistro(parseOsRelease(os.fs.read(OS_RELEASE_PATH)));
    } catch (err: unknown) {
      logger.debug(`Could not read ${OS_RELEASE_PATH}: ${errorMessage(err)}`);
    }
  }

  return { osFamily, distro, arch: os.host.arch() };
}

export * from './types.ts';
