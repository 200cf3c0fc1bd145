/**
 * Process exit codes. Each one names exactly one failure class.
 * 9 to 11 are reserved for macOS post-install fixups and never emitted here.
 */
export const ExitCode = {
  RootUser: 1,
  UnsupportedPlatform: 2,
  DependencyInstallFailed: 3,
  UnsupportedShell: 4,
  EnvironmentConfigFailed: 5,
  CloneFailed: 6,
  ToolchainInstallFailed: 7,
  SDKInstallFailed: 8,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * A terminal provisioning failure. The CLI prints the message and exits with the code.
 */
export class BootstrapError extends Error {
  constructor(
    public readonly exitCode: ExitCode,
    message: string,
  ) {
    super(message);
    this.name = 'BootstrapError';
  }
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
