import path from 'node:path';
import { getOS } from '../common/os/index.ts';
import { DEFAULT_ROOT_NAME, ROOT_VARIABLE } from '../config.ts';
import { BootstrapError, ExitCode, errorMessage } from '../errors.ts';
import { logger } from '../logger.ts';
import { type ShellProfile, exportLine } from '../shell/index.ts';

export class EnvironmentConfigurator {
  private os = getOS();

  constructor(private profile: ShellProfile) {}

  isSatisfied(): boolean {
    return Boolean(this.os.env.get(ROOT_VARIABLE));
  }

  /**
   * Returns the installation root, persisting THEOS to the shell profile first if it is unset.
   * An existing value is trusted as-is.
   */
  async ensureInstallationRoot(): Promise<string> {
    const current = this.os.env.get(ROOT_VARIABLE);
    if (current) {
      logger.debug(`${ROOT_VARIABLE} already set to ${current}`);
      return current;
    }

    if (this.profile.dialect === 'unknown') {
      throw new BootstrapError(
        ExitCode.UnsupportedShell,
        `Unrecognized shell. Please set ${ROOT_VARIABLE} in your shell's startup file and re-run.`,
      );
    }

    const root = path.join(this.os.host.homedir(), DEFAULT_ROOT_NAME);
    const line = exportLine(this.profile, ROOT_VARIABLE, `~/${DEFAULT_ROOT_NAME}`);

    logger.info(`Setting ${ROOT_VARIABLE} in ${this.profile.path}...`);
    try {
      this.os.fs.mkdir(path.dirname(this.profile.path), { recursive: true });
      this.os.fs.append(this.profile.path, `\n# Theos\n${line}\n`);
    } catch (err: unknown) {
      throw new BootstrapError(
        ExitCode.EnvironmentConfigFailed,
        `Failed to write ${this.profile.path}: ${errorMessage(err)}`,
      );
    }

    this.os.env.set(ROOT_VARIABLE, root);
    logger.success(`${ROOT_VARIABLE} set to ${root}.`);
    return root;
  }
}
