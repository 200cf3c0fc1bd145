import { getOS } from '../common/os/index.ts';
import { DEBIAN_PACKAGES } from '../config.ts';
import { BootstrapError, ExitCode, errorMessage } from '../errors.ts';
import { logger } from '../logger.ts';
import type { PlatformInfo } from '../platform/index.ts';

export class DependencyInstaller {
  private os = getOS();

  constructor(private platform: PlatformInfo) {}

  /**
   * Installs the build dependencies with apt on Debian-like systems.
   * Elsewhere the package list is printed for the user to install by hand.
   */
  async install(): Promise<void> {
    if (this.platform.distro !== 'debian') {
      logger.warn(
        `Unrecognized distribution. Please make sure these packages (or your distribution's equivalents) are installed: ${DEBIAN_PACKAGES.join(' ')}`,
      );
      return;
    }

    logger.info(`Installing dependencies: ${DEBIAN_PACKAGES.join(', ')}...`);
    try {
      await this.os.proc.sudo('apt-get', ['update'], { silent: false });
      await this.os.proc.sudo('apt-get', ['install', '-y', ...DEBIAN_PACKAGES], { silent: false });
    } catch (err: unknown) {
      throw new BootstrapError(
        ExitCode.DependencyInstallFailed,
        `Dependency installation failed: ${errorMessage(err)}`,
      );
    }
    logger.success('Dependencies installed.');
  }

  /**
   * Installs a single extra package, warning instead of failing.
   * A no-op outside Debian-like systems.
   */
  async installOptional(pkg: string): Promise<void> {
    if (this.platform.distro !== 'debian') return;
    try {
      await this.os.proc.sudo('apt-get', ['install', '-y', pkg], { silent: false });
    } catch (err: unknown) {
      logger.warn(`Failed to install optional package "${pkg}": ${errorMessage(err)}`);
    }
  }
}
