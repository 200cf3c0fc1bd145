import path from 'node:path';
import { getOS } from '../common/os/index.ts';
import type { DialectRule, KnownShellProfile, ShellProfile } from './types.ts';

export const DIALECTS = {
  posix: {
    names: ['bash', 'zsh', 'sh', 'ksh', 'dash'],
    candidates: ['.bashrc', '.zshrc', '.bash_profile', '.zprofile', '.profile'],
    fallback: '.profile',
  },
  fish: {
    names: ['fish'],
    candidates: ['.config/fish/config.fish'],
    fallback: '.config/fish/config.fish',
  },
} as const satisfies Record<KnownShellProfile['dialect'], DialectRule>;

function pickProfile(rule: DialectRule, home: string): string {
  const os = getOS();
  const existing = rule.candidates
    .map((file) => path.join(home, file))
    .find((file) => os.fs.exists(file));
  return existing ?? path.join(home, rule.fallback);
}

/**
 * Maps the invoking shell to its dialect and startup file.
 * Accepts a bare name or a full path such as the value of $SHELL.
 */
export function resolveShellProfile(shell: string, home: string): ShellProfile {
  const name = path.basename(shell);
  const posixNames: readonly string[] = DIALECTS.posix.names;
  if (posixNames.includes(name)) {
    return { dialect: 'posix', path: pickProfile(DIALECTS.posix, home) };
  }
  const fishNames: readonly string[] = DIALECTS.fish.names;
  if (fishNames.includes(name)) {
    return { dialect: 'fish', path: pickProfile(DIALECTS.fish, home) };
  }
  return { dialect: 'unknown' };
}

/**
 * The line that persists the installation root in the given shell's startup file.
 */
export function exportLine(profile: KnownShellProfile, variable: string, value: string): string {
  switch (profile.dialect) {
    case 'posix':
      return `export ${variable}=${value}`;
    case 'fish':
      return `set -gx ${variable} ${value}`;
  }
}

export type * from './types.ts';
