export interface IFileSystem {
  exists(path: string): boolean;
  mkdir(path: string, options?: { recursive?: boolean }): void;
  /**
   * Names of the entries directly inside a directory. Empty when the directory is missing.
   */
  list(path: string): string[];
  read(path: string): string;
  append(path: string, content: string): void;
  rename(from: string, to: string): void;
  remove(path: string, options?: { recursive?: boolean }): void;
  stat(path: string): { mode: number };
  /**
   * Creates a fresh, uniquely named directory under the system temp dir.
   */
  mkdtemp(prefix: string): string;
}

export interface ExecOptions {
  /**
   * If false, the command shares the terminal (needed for sudo password prompts and
   * download progress). Output of silent commands is only shown in debug mode.
   */
  silent?: boolean;
  /**
   * Working directory.
   */
  cwd?: string;
}

export interface IProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  command: string;
}

/**
 * Runs external programs. Both methods reject when the program exits non-zero.
 */
export interface IProcessRunner {
  run(file: string, args: string[], options?: ExecOptions): Promise<IProcessResult>;
  sudo(file: string, args: string[], options?: ExecOptions): Promise<IProcessResult>;
}

export interface IEnv {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
}

/**
 * Identity of the machine and the invoking user.
 */
export interface IHost {
  platform(): string;
  arch(): string;
  /**
   * Effective uid, undefined where the platform has none.
   */
  uid(): number | undefined;
  homedir(): string;
}

export interface IOS {
  fs: IFileSystem;
  proc: IProcessRunner;
  env: IEnv;
  host: IHost;
}
