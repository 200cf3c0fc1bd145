import fs from 'node:fs';
import nodeOs from 'node:os';
import path from 'node:path';
import { run, sudoRun } from './exec.ts';
import type {
  ExecOptions,
  IEnv,
  IFileSystem,
  IHost,
  IOS,
  IProcessResult,
  IProcessRunner,
} from './interface.ts';

class RealFileSystem implements IFileSystem {
  exists(path: string): boolean {
    return fs.existsSync(path);
  }
  mkdir(path: string, options?: { recursive?: boolean }): void {
    fs.mkdirSync(path, options);
  }
  list(path: string): string[] {
    if (!fs.existsSync(path)) return [];
    return fs.readdirSync(path);
  }
  read(path: string): string {
    return fs.readFileSync(path, 'utf-8');
  }
  append(path: string, content: string): void {
    fs.appendFileSync(path, content);
  }
  rename(from: string, to: string): void {
    try {
      fs.renameSync(from, to);
    } catch (err: unknown) {
      // The temp dir often lives on another filesystem than $HOME.
      if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
      fs.cpSync(from, to, { recursive: true });
      fs.rmSync(from, { recursive: true, force: true });
    }
  }
  remove(path: string, options?: { recursive?: boolean }): void {
    fs.rmSync(path, { force: true, ...options });
  }
  stat(path: string): { mode: number } {
    return { mode: fs.statSync(path).mode };
  }
  mkdtemp(prefix: string): string {
    return fs.mkdtempSync(path.join(nodeOs.tmpdir(), prefix));
  }
}

class RealEnv implements IEnv {
  get(key: string): string | undefined {
    return process.env[key];
  }
  set(key: string, value: string): void {
    process.env[key] = value;
  }
}

class RealHost implements IHost {
  platform(): string {
    return process.platform;
  }
  arch(): string {
    return process.arch;
  }
  uid(): number | undefined {
    return process.getuid?.();
  }
  homedir(): string {
    return nodeOs.homedir();
  }
}

class RealProcessRunner implements IProcessRunner {
  async run(file: string, args: string[], options?: ExecOptions): Promise<IProcessResult> {
    return run(file, args, options);
  }
  async sudo(file: string, args: string[], options?: ExecOptions): Promise<IProcessResult> {
    return sudoRun(file, args, options);
  }
}

export const RealOS: IOS = {
  fs: new RealFileSystem(),
  proc: new RealProcessRunner(),
  env: new RealEnv(),
  host: new RealHost(),
};
