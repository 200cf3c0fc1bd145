import path from 'node:path';
import { getOS } from '../common/os/index.ts';
import {
  type InstallLayout,
  TOOLCHAIN_ARCHES,
  TOOLCHAIN_EXTRA_PACKAGE,
  toolchainUrl,
} from '../config.ts';
import { BootstrapError, ExitCode, errorMessage } from '../errors.ts';
import { logger } from '../logger.ts';
import type { PlatformInfo } from '../platform/index.ts';
import { type AnswerSource, parseBoolean } from '../prompt/index.ts';
import type { DependencyInstaller } from './DependencyInstaller.ts';
import { type ResourceOutcome, ensureResource } from './resource.ts';

export const SWIFT_QUESTION = 'Install the Swift toolchain as well? (y/N)';

export class ToolchainProvisioner {
  private os = getOS();

  constructor(
    private layout: InstallLayout,
    private platform: PlatformInfo,
    private answers: AnswerSource,
    private dependencies: DependencyInstaller,
  ) {}

  isSatisfied(): boolean {
    return this.os.fs.list(this.layout.toolchainDir).length > 0;
  }

  /**
   * The compiler must exist and carry an executable bit; a clean extraction alone proves nothing.
   */
  isCompilerExecutable(): boolean {
    if (!this.os.fs.exists(this.layout.compiler)) return false;
    return (this.os.fs.stat(this.layout.compiler).mode & 0o111) !== 0;
  }

  async ensureToolchain(): Promise<ResourceOutcome> {
    return ensureResource({
      name: 'iOS toolchain',
      isSatisfied: () => this.isSatisfied(),
      acquire: () => this.install(),
      verify: () => this.isCompilerExecutable(),
      failure: ExitCode.ToolchainInstallFailed,
    });
  }

  private async install(): Promise<void> {
    const wantsSwift = parseBoolean(await this.answers.ask(SWIFT_QUESTION));
    if (wantsSwift) {
      throw new BootstrapError(
        ExitCode.ToolchainInstallFailed,
        'The Swift toolchain is not supported yet. Re-run and decline it to install the standard toolchain.',
      );
    }

    const arch = TOOLCHAIN_ARCHES[this.platform.arch];
    if (!arch) {
      throw new BootstrapError(
        ExitCode.ToolchainInstallFailed,
        `No prebuilt toolchain for architecture "${this.platform.arch}".`,
      );
    }

    await this.dependencies.installOptional(TOOLCHAIN_EXTRA_PACKAGE);

    const url = toolchainUrl(arch);
    const archive = path.join(this.layout.toolchainRoot, path.basename(url));

    logger.info(`Downloading toolchain from ${url}...`);
    try {
      this.os.fs.mkdir(this.layout.toolchainRoot, { recursive: true });
      await this.os.proc.run('curl', ['-fL', '-#', '-o', archive, url], { silent: false });
      await this.os.proc.run('tar', ['-xJf', archive, '-C', this.layout.toolchainRoot]);
    } catch (err: unknown) {
      throw new BootstrapError(
        ExitCode.ToolchainInstallFailed,
        `Toolchain installation failed: ${errorMessage(err)}`,
      );
    } finally {
      this.os.fs.remove(archive);
    }
  }
}
