import { execa } from 'execa';

/**
 * One call into the host library's import routine
 */
export type ImportRequest = {
  directory: string;
  /** Import every file as a singleton instead of grouping them into an album */
  singleton: boolean;
  /** Flexible attributes set on every imported item */
  fields: Record<string, string>;
  verbose: boolean;
};

export type LibraryImporter = {
  getName(): string;
  importDirectory(request: ImportRequest): Promise<void>;
  /** Whether any library item has `field` set to exactly `value` */
  contains(field: string, value: string): Promise<boolean>;
};

/**
 * Imports through the `beet` command line
 *
 * `beet import` asks questions when matches are uncertain, so the
 * terminal is handed to it.
 */
export class BeetsImporter implements LibraryImporter {
  constructor(
    private readonly command: string = 'beet',
    private readonly configPath?: string,
  ) {}

  getName(): string {
    return this.command;
  }

  buildArgs(request: ImportRequest): string[] {
    const args = this.globalArgs();

    if (request.verbose) {
      args.push('-v');
    }

    args.push('import');
    if (request.singleton) {
      args.push('--singletons');
    }
    for (const [field, value] of Object.entries(request.fields)) {
      args.push('--set', `${field}=${value}`);
    }
    args.push(request.directory);

    return args;
  }

  async importDirectory(request: ImportRequest): Promise<void> {
    await execa(this.command, this.buildArgs(request), { stdio: 'inherit' });
  }

  /**
   * Arguments of `beet ls` matching one field exactly (regular expression query)
   */
  buildQueryArgs(field: string, value: string): string[] {
    return [...this.globalArgs(), 'ls', `${field}::^${escapeRegExp(value)}$`];
  }

  async contains(field: string, value: string): Promise<boolean> {
    const { stdout } = await execa(this.command, this.buildQueryArgs(field, value));
    return stdout.trim() !== '';
  }

  private globalArgs(): string[] {
    return this.configPath ? ['-c', this.configPath] : [];
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
