import { getOS } from '../common/os/index.ts';
import { type InstallLayout, REPOSITORY_URL } from '../config.ts';
import { BootstrapError, ExitCode, errorMessage } from '../errors.ts';
import { logger } from '../logger.ts';
import { type ResourceOutcome, ensureResource } from './resource.ts';

export class RepositorySynchronizer {
  private os = getOS();

  constructor(private layout: InstallLayout) {}

  /**
   * Any content under the root counts as a previous clone.
   */
  isSatisfied(): boolean {
    return this.os.fs.list(this.layout.root).length > 0;
  }

  async ensureRepository(): Promise<ResourceOutcome> {
    const outcome = await ensureResource({
      name: 'Theos',
      isSatisfied: () => this.isSatisfied(),
      acquire: () => this.clone(),
      verify: () => true,
      failure: ExitCode.CloneFailed,
    });

    if (outcome === 'present') {
      await this.update();
    }
    return outcome;
  }

  private async clone(): Promise<void> {
    logger.info(`Cloning ${REPOSITORY_URL} into ${this.layout.root}...`);
    try {
      await this.os.proc.run('git', ['clone', '--recursive', REPOSITORY_URL, this.layout.root], {
        silent: false,
      });
    } catch (err: unknown) {
      throw new BootstrapError(ExitCode.CloneFailed, `Theos clone failed: ${errorMessage(err)}`);
    }
  }

  /**
   * Hands over to the checkout's own updater instead of re-cloning.
   */
  private async update(): Promise<void> {
    logger.info('Updating Theos...');
    try {
      await this.os.proc.run(this.layout.updateScript, [], { silent: false, cwd: this.layout.root });
    } catch (err: unknown) {
      throw new BootstrapError(
        ExitCode.CloneFailed,
        `Updating the existing Theos checkout at ${this.layout.root} failed: ${errorMessage(err)}\n` +
          'Fix the checkout (or remove it to clone afresh) and re-run; re-running is safe.',
      );
    }
  }
}
