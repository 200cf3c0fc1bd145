import path from 'node:path';
import { getOS } from '../common/os/index.ts';
import { type InstallLayout, SDKS_URL } from '../config.ts';
import { BootstrapError, ExitCode, errorMessage } from '../errors.ts';
import { logger } from '../logger.ts';
import { type ResourceOutcome, ensureResource } from './resource.ts';

export class SdkProvisioner {
  private os = getOS();

  constructor(private layout: InstallLayout) {}

  isSatisfied(): boolean {
    return this.os.fs.list(this.layout.sdkDir).some((name) => /sdk/i.test(name));
  }

  async ensureSDKs(): Promise<ResourceOutcome> {
    return ensureResource({
      name: 'iOS SDKs',
      isSatisfied: () => this.isSatisfied(),
      acquire: () => this.install(),
      failure: ExitCode.SDKInstallFailed,
    });
  }

  /**
   * Unpacks the SDK tarball in a scratch directory and moves the *.sdk bundles into place.
   * The scratch directory, archive included, is always removed.
   */
  private async install(): Promise<void> {
    let workDir: string | undefined;

    logger.info(`Downloading SDKs from ${SDKS_URL}...`);
    try {
      workDir = this.os.fs.mkdtemp('theos-sdks-');
      const archive = path.join(workDir, 'sdks.tar.gz');
      const extractDir = path.join(workDir, 'sdks');

      await this.os.proc.run('curl', ['-fL', '-#', '-o', archive, SDKS_URL], { silent: false });
      this.os.fs.mkdir(extractDir);
      await this.os.proc.run('tar', ['-xzf', archive, '-C', extractDir, '--strip-components=1']);

      this.os.fs.mkdir(this.layout.sdkDir, { recursive: true });
      const bundles = this.os.fs.list(extractDir).filter((name) => name.endsWith('.sdk'));
      for (const bundle of bundles) {
        this.os.fs.rename(path.join(extractDir, bundle), path.join(this.layout.sdkDir, bundle));
      }
      logger.debug(`Moved ${bundles.length} SDK(s) into ${this.layout.sdkDir}`);
    } catch (err: unknown) {
      throw new BootstrapError(ExitCode.SDKInstallFailed, `SDK installation failed: ${errorMessage(err)}`);
    } finally {
      if (workDir) this.os.fs.remove(workDir, { recursive: true });
    }
  }
}
