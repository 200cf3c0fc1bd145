export type ShellProfile =
  | { dialect: 'posix'; path: string }
  | { dialect: 'fish'; path: string }
  | { dialect: 'unknown' };

export type KnownShellProfile = Exclude<ShellProfile, { dialect: 'unknown' }>;

export type ShellDialect = ShellProfile['dialect'];

export interface DialectRule {
  names: readonly string[];
  /**
   * Home-relative startup files, probed in order.
   */
  candidates: readonly string[];
  /**
   * Home-relative file used when no candidate exists yet.
   */
  fallback: string;
}
