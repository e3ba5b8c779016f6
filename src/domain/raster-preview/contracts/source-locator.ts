export interface LocatedFile {
  readonly absolutePath: string;
  /** Path relative to the listed directory, using `/` separators. */
  readonly relativePath: string;
}

export interface ListOptions {
  readonly extensions: readonly string[];
  readonly recursive: boolean;
}

export interface SourceLocator {
  /** Lists matching files in code-unit order of their relative paths. */
  list(directory: string, options: ListOptions): Promise<LocatedFile[]>;
}
