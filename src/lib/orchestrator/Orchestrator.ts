import path from 'node:path';
import { getOS } from '../common/os/index.ts';
import { DEFAULT_ROOT_NAME, ROOT_VARIABLE, installLayout } from '../config.ts';
import { BootstrapError, ExitCode } from '../errors.ts';
import { logger } from '../logger.ts';
import { SUPPORTED_OS_FAMILY, detectPlatform } from '../platform/index.ts';
import type { AnswerSource } from '../prompt/index.ts';
import {
  DependencyInstaller,
  EnvironmentConfigurator,
  RepositorySynchronizer,
  SdkProvisioner,
  ToolchainProvisioner,
} from '../provision/index.ts';
import { resolveShellProfile } from '../shell/index.ts';
import type { StatusReport } from './types.ts';

export class Orchestrator {
  private os = getOS();

  constructor(private answers: AnswerSource) {}

  /**
   * Runs every provisioning stage in order. The first failure aborts the run with its BootstrapError.
   */
  async run(): Promise<void> {
    if (this.os.host.uid() === 0) {
      throw new BootstrapError(
        ExitCode.RootUser,
        'Do not run this as root. sudo is invoked where it is needed.',
      );
    }

    const platform = detectPlatform();
    if (platform.osFamily !== SUPPORTED_OS_FAMILY) {
      throw new BootstrapError(
        ExitCode.UnsupportedPlatform,
        `Unsupported platform "${platform.osFamily}". Only Linux is supported.`,
      );
    }
    logger.debug(`Platform: ${platform.osFamily} (${platform.distro}, ${platform.arch})`);

    const dependencies = new DependencyInstaller(platform);
    await dependencies.install();

    const profile = resolveShellProfile(this.os.env.get('SHELL') ?? '', this.os.host.homedir());
    const root = await new EnvironmentConfigurator(profile).ensureInstallationRoot();
    const layout = installLayout(root);

    await new RepositorySynchronizer(layout).ensureRepository();
    await new ToolchainProvisioner(layout, platform, this.answers, dependencies).ensureToolchain();
    await new SdkProvisioner(layout).ensureSDKs();
  }

  /**
   * Reports which resources are in place without changing anything.
   */
  status(): StatusReport {
    const root =
      this.os.env.get(ROOT_VARIABLE) || path.join(this.os.host.homedir(), DEFAULT_ROOT_NAME);
    const layout = installLayout(root);
    const platform = detectPlatform();
    const profile = resolveShellProfile(this.os.env.get('SHELL') ?? '', this.os.host.homedir());

    return {
      root,
      state: {
        environment: new EnvironmentConfigurator(profile).isSatisfied(),
        repository: new RepositorySynchronizer(layout).isSatisfied(),
        toolchain: new ToolchainProvisioner(
          layout,
          platform,
          this.answers,
          new DependencyInstaller(platform),
        ).isSatisfied(),
        sdks: new SdkProvisioner(layout).isSatisfied(),
      },
    };
  }
}
