import chalk from 'chalk';
import { Orchestrator } from '../lib/orchestrator/index.ts';
import type { ResourceState } from '../lib/orchestrator/index.ts';
import { FixedAnswerSource } from '../lib/prompt/index.ts';

const LABELS: [keyof ResourceState, string][] = [
  ['environment', 'THEOS variable'],
  ['repository', 'Theos checkout'],
  ['toolchain', 'iOS toolchain'],
  ['sdks', 'iOS SDKs'],
];

export function statusCommand() {
  const { root, state } = new Orchestrator(new FixedAnswerSource('no')).status();

  console.log(chalk.bold.cyan(`🩺 Theos installation at ${root}\n`));
  for (const [key, label] of LABELS) {
    console.log(state[key] ? chalk.green(`✅ ${label}`) : chalk.red(`❌ ${label}: missing`));
  }
}
