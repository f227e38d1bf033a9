export interface RunCommandOptions {
  quiet?: boolean;
  verbose?: boolean;
  bell?: boolean;
  status?: boolean;
  color?: boolean;
  partial?: boolean;
  promptTimeout?: number | string;
}
