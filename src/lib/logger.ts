import chalk from 'chalk';
import { getOS } from './common/os/index.ts';

/**
 * Console output for the CLI. Debug lines appear only when DEBUG is set.
 */
export const logger = {
  info: (msg: string) => console.log(chalk.blue('ℹ ') + msg),
  success: (msg: string) => console.log(chalk.green('✔ ') + msg),
  warn: (msg: string) => console.log(chalk.yellow('⚠ ') + msg),
  error: (msg: string) => console.error(chalk.red('✖ ') + msg),
  debug: (msg: string) => {
    if (getOS().env.get('DEBUG')) {
      console.log(chalk.gray('⚙ ') + msg);
    }
  },
};
