export type Distro = 'debian' | 'unknown';

export interface PlatformInfo {
  readonly osFamily: string;
  readonly distro: Distro;
  readonly arch: string;
}

export const SUPPORTED_OS_FAMILY = 'linux';
