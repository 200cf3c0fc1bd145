import path from 'node:path';
import type { IEnv } from './common/os/index.ts';

export const ROOT_VARIABLE = 'THEOS';
export const CI_VARIABLE = 'CI';

/**
 * Installation root used when THEOS is unset, relative to the home directory.
 */
export const DEFAULT_ROOT_NAME = 'theos';

export const REPOSITORY_URL = 'https://github.com/theos/theos.git';
export const SDKS_URL = 'https://github.com/theos/sdks/archive/master.tar.gz';

export const toolchainUrl = (arch: string) =>
  `https://github.com/L1ghtmann/llvm-project/releases/latest/download/iOSToolchain-${arch}.tar.xz`;

/**
 * Node's names for the CPU architectures the prebuilt toolchain ships for.
 */
export const TOOLCHAIN_ARCHES: Record<string, string> = {
  x64: 'x86_64',
  arm64: 'aarch64',
};

export const DEBIAN_PACKAGES = [
  'build-essential',
  'fakeroot',
  'rsync',
  'curl',
  'perl',
  'zip',
  'git',
  'libxml2',
];

/**
 * Runtime library the toolchain links against; installed on a best-effort basis.
 */
export const TOOLCHAIN_EXTRA_PACKAGE = 'libz3-dev';

/**
 * Every path the provisioners touch, derived from one installation root.
 */
export interface InstallLayout {
  root: string;
  updateScript: string;
  toolchainRoot: string;
  toolchainDir: string;
  compiler: string;
  sdkDir: string;
}

export function installLayout(root: string): InstallLayout {
  const toolchainRoot = path.join(root, 'toolchain');
  const toolchainDir = path.join(toolchainRoot, 'linux', 'iphone');
  return {
    root,
    updateScript: path.join(root, 'bin', 'update-theos'),
    toolchainRoot,
    toolchainDir,
    compiler: path.join(toolchainDir, 'bin', 'clang'),
    sdkDir: path.join(root, 'sdks'),
  };
}

export interface InstallOptions {
  ci?: boolean;
}

export interface ResolvedOptions {
  ci: boolean;
}

/**
 * Merges CLI flags with the environment. Any non-empty CI value counts.
 */
export function resolveOptions(options: InstallOptions, env: IEnv): ResolvedOptions {
  return {
    ci: options.ci === true || Boolean(env.get(CI_VARIABLE)),
  };
}
