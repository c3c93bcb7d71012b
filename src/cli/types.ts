export enum OutputFormat {
  Line = "line",
  Json = "json",
}

export interface ExecuteChunkOptions {
  cwd?: string;
  env?: unknown;
}
