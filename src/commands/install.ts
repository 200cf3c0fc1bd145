import chalk from 'chalk';
import { getOS } from '../lib/common/os/index.ts';
import { type InstallOptions, resolveOptions } from '../lib/config.ts';
import { BootstrapError } from '../lib/errors.ts';
import { logger } from '../lib/logger.ts';
import { Orchestrator } from '../lib/orchestrator/index.ts';
import { FixedAnswerSource, InteractiveAnswerSource } from '../lib/prompt/index.ts';

export async function installCommand(options: InstallOptions) {
  const { ci } = resolveOptions(options, getOS().env);
  const answers = ci ? new FixedAnswerSource('no') : new InteractiveAnswerSource();

  console.log(chalk.bold('🚀 Bootstrapping Theos...'));

  try {
    await new Orchestrator(answers).run();
  } catch (err: unknown) {
    if (err instanceof BootstrapError) {
      logger.error(err.message);
      process.exit(err.exitCode);
    }
    throw err;
  }

  console.log(chalk.bold.green('\n✅ Theos is ready. Open a new shell to pick up THEOS.'));
}
